import { Router } from "express";
import { container } from "../../../di/Container";
import { PlaceholdersController } from "../controllers/PlaceholdersController";

/**
 * Placeholder Resolution Routes
 */
export function createPlaceholdersRouter(): Router {
  const router = Router();
  const controller = container.resolve(PlaceholdersController);

  // POST /api/placeholders/resolve - Resolve directives in a source set
  router.post("/resolve", (req, res, next) =>
    controller.resolve(req, res, next),
  );

  return router;
}
