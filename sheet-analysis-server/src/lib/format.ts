const pad = (n: number, width = 2) => String(n).padStart(width, "0");

/** Local time as `YYYYMMDD-HHMMSS`, used in history filenames. */
export const formatCompactTimestamp = (d: Date) =>
  `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}` +
  `-${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export const formatDisplayTimestamp = (d: Date) =>
  `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}` +
  ` ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
