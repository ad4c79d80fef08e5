import express from "express";
import type { CoachPlanService } from "../services/coachPlan.service";
import healthRoute from "./health";
import coachRoute from "./coach";

export default function routes(coachPlanService: CoachPlanService) {
  const router = express.Router();

  const health = healthRoute(coachPlanService);
  router.use("/health", health);
  router.use("/api/health", health);

  router.use("/api/v1/coach", coachRoute(coachPlanService));

  return router;
}
