import { Request, Response, NextFunction } from "express";
import type { CoachPlanService } from "../services/coachPlan.service";
import { logger } from "../utils/logger";
import { sendSuccess } from "../utils/response";
import type { PlanCheckBody, PromptBody } from "../validators/coach.validator";

export class CoachController {
  constructor(private readonly coachPlanService: CoachPlanService) {}

  /**
   * @route GET /api/v1/coach/profile
   * @desc Records extracted from the injury and skills notes
   */
  getProfile = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const profile = await this.coachPlanService.loadProfile();
      sendSuccess(res, "Athlete profile loaded", profile);
    } catch (error) {
      next(error);
    }
  };

  /**
   * @route POST /api/v1/coach/prompt
   */
  buildPrompt = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: PromptBody = req.body;
      const coachPrompt = await this.coachPlanService.buildCoachPrompt(body);
      sendSuccess(res, "Coach prompt built", coachPrompt);
    } catch (error) {
      next(error);
    }
  };

  /**
   * @route POST /api/v1/coach/plan
   * @desc Sends the prompt to the hosted model; prompt only when none is configured
   */
  generatePlan = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: PromptBody = req.body;
      logger.info("[Controller] - Generating training plan");
      const startTime = Date.now();
      const result = await this.coachPlanService.generatePlan(body);

      if (result.status === "prompt_only") {
        sendSuccess(res, "No hosted model configured, returning prompt", result);
        return;
      }
      sendSuccess(
        res,
        `Generated ${result.quality.totals.weeks}-week plan`,
        { ...result, generationTime: Date.now() - startTime },
        201
      );
    } catch (error) {
      next(error);
    }
  };

  /**
   * @route POST /api/v1/coach/plan/check
   */
  checkPlan = (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: PlanCheckBody = req.body;
      const result = this.coachPlanService.checkPlanText(body.text, body.settings);
      sendSuccess(
        res,
        result.quality.valid
          ? "Plan passed the quality check"
          : `Plan has ${result.quality.issues.length} issue(s)`,
        result
      );
    } catch (error) {
      next(error);
    }
  };
}
