import express from "express";
import { CoachController } from "../../controllers/coach.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { validateContentType } from "../../middlewares/validation.middleware";
import type { CoachPlanService } from "../../services/coachPlan.service";
import {
  planCheckBodySchema,
  promptBodySchema,
} from "../../validators/coach.validator";

export default function coachRoute(coachPlanService: CoachPlanService) {
  const router = express.Router();
  const controller = new CoachController(coachPlanService);

  router.get("/profile", controller.getProfile);

  router.post(
    "/prompt",
    validateContentType,
    validateRequest({ body: promptBodySchema }),
    controller.buildPrompt
  );

  router.post(
    "/plan",
    validateContentType,
    validateRequest({ body: promptBodySchema }),
    controller.generatePlan
  );

  router.post(
    "/plan/check",
    validateContentType,
    validateRequest({ body: planCheckBodySchema }),
    controller.checkPlan
  );

  return router;
}
