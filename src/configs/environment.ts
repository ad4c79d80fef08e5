import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const numeric = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "must be a number")
  .optional();

const envSchema = z.object({
  PORT: numeric,
  NODE_ENV: z.string().optional(),

  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().optional(),
  GEMINI_TEMPERATURE: numeric,
  GEMINI_MAX_TOKENS: numeric,

  OLLAMA_MODEL: z.string().optional(),

  COACH_DATA_DIR: z.string().optional(),
  COACH_YAML_DIR: z.string().optional(),
  COACH_MAX_YAML_FILES: numeric,
  COACH_MAX_CHARS_PER_FILE: numeric,

  LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error", "silent"])
    .optional(),

  RATE_LIMIT_WINDOW: numeric,
  RATE_LIMIT_MAX: numeric,
  CORS_ORIGIN: z.string().optional(),
});

export type AppConfig = ReturnType<typeof buildConfig>;

const buildConfig = () => {
  const env = process.env;
  return {
    port: parseInt(env.PORT || "3000", 10),
    nodeEnv: env.NODE_ENV || "development",
    gemini: {
      apiKey: env.GEMINI_API_KEY || "",
      model: env.GEMINI_MODEL || "gemini-2.5-flash",
      temperature: parseFloat(env.GEMINI_TEMPERATURE || "0.4"),
      maxTokens: parseInt(env.GEMINI_MAX_TOKENS || "8192", 10),
    },
    ollama: {
      model: env.OLLAMA_MODEL || "llama3.1:8b",
    },
    vault: {
      dataDir: env.COACH_DATA_DIR || "data",
      yamlDir: env.COACH_YAML_DIR || "gym-data",
      maxYamlFiles: parseInt(env.COACH_MAX_YAML_FILES || "50", 10),
      maxCharsPerFile: parseInt(env.COACH_MAX_CHARS_PER_FILE || "12000", 10),
    },
    api: {
      rateLimit: {
        windowMs: parseInt(env.RATE_LIMIT_WINDOW || "900000", 10),
        max: parseInt(env.RATE_LIMIT_MAX || "100", 10),
      },
      cors: {
        origin: env.CORS_ORIGIN?.split(",") || ["http://localhost:3000"],
      },
    },
  };
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = buildConfig();
  }
  return cachedConfig;
};

export const validateConfig = (): AppConfig => {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return loadConfig();
};
