import "dotenv/config";
import { validateConfig } from "./src/configs/environment";
import { createApp } from "./src/server";
import { logger } from "./src/utils/logger";

const config = validateConfig();
const app = createApp();

app.listen(config.port, () =>
  logger.info(`Coach vault service started on port ${config.port}`)
);
