import { Router } from "express";
import { ErrorCodes, errorMessage } from "../errors";
import { listHistory } from "../services/historyStore";

export default function historyRouter(root: string): Router {
  const router = Router();

  router.get("/history", async (_req, res) => {
    try {
      res.json(await listHistory(root));
    } catch (err) {
      const error = errorMessage(err);
      console.error(`[history] ${ErrorCodes.HISTORY_LIST_FAILED}:`, error);
      res.status(500).json({ error });
    }
  });

  return router;
}
