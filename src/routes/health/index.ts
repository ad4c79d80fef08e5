import express from "express";
import type { CoachPlanService } from "../../services/coachPlan.service";

export default function healthRoute(coachPlanService: CoachPlanService) {
  const healthRouter = express.Router();

  healthRouter.get("/", (_req, res) => {
    res.json({
      success: true,
      message: "Coach vault service is healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env.NODE_ENV || "development",
    });
  });

  healthRouter.get("/status", (_req, res) => {
    res.json({
      success: true,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      services: {
        plan_model: coachPlanService.hasModel ? "configured" : "not_configured",
        prompt_builder: "active",
        plan_check: "active",
      },
      endpoints: {
        profile: "/api/v1/coach/profile",
        prompt: "/api/v1/coach/prompt",
        plan: "/api/v1/coach/plan",
        check: "/api/v1/coach/plan/check",
      },
    });
  });

  return healthRouter;
}
