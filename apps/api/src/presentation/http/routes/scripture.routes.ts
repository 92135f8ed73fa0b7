import { Router } from "express";
import { container } from "../../../di/Container";
import { ScriptureController } from "../controllers/ScriptureController";

/**
 * Scripture Routes
 */
export function createScriptureRouter(): Router {
  const router = Router();
  const controller = container.resolve(ScriptureController);

  // GET /api/scripture - Look up one passage
  router.get("/", (req, res, next) => controller.lookup(req, res, next));

  return router;
}
