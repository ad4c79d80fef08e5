import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import { loadConfig } from "./configs/environment";
import { errorMiddleware, notFoundMiddleware } from "./middlewares/error.middleware";
import { requestLogger } from "./middlewares/logger.middleware";
import { createRateLimiter } from "./middlewares/validation.middleware";
import routes from "./routes";
import { CoachPlanService } from "./services/coachPlan.service";

export function createApp(coachPlanService: CoachPlanService = new CoachPlanService()) {
  const config = loadConfig();
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.api.cors.origin }));
  app.use(compression());
  app.use(express.json({ limit: "1mb" }));
  app.use(createRateLimiter(config.api.rateLimit));
  app.use(requestLogger);

  app.use("/", routes(coachPlanService));

  app.use(notFoundMiddleware);
  // Error middleware should be last
  app.use(errorMiddleware);

  return app;
}
