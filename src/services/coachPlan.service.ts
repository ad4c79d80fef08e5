import dayjs from "dayjs";
import { v4 as uuidv4 } from "uuid";
import { loadConfig } from "../configs/environment";
import {
  DEFAULT_MD_FILES,
  VaultLoader,
  vaultLoader,
} from "../loaders/vaultLoader";
import type {
  CoachPrompt,
  PlanResult,
} from "../types/model/coachPrompt.model";
import type { AthleteProfile } from "../types/model/athleteProfile.model";
import type { CoachSettings } from "../types/model/coachSettings.model";
import type { ParsedPlan, PlanQualityReport } from "../types/model/plan.model";
import { parseIsoDate, weekStartDates } from "../utils/convert";
import { UpstreamError, ValidationError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { resolvedSettingsSchema } from "../validators/coach.validator";
import { checkPlanQuality, parsePlan } from "./planParser.service";
import { createPlanModel, type PlanModel } from "./planModel.service";
import {
  ProfileParserService,
  profileParserService,
} from "./profileParser.service";
import { buildPrompt, ollamaCommands, resolveSettings } from "./promptBuilder.service";

export interface VaultOptions {
  dataDir: string;
  yamlDir: string;
  maxYamlFiles: number;
  maxCharsPerFile: number;
  localModel: string;
}

export interface CoachRequest {
  settings?: Partial<CoachSettings>;
  startDate?: string;
  maxYamlFiles?: number;
  promptFile?: string;
}

export interface PlanCheck {
  plan: ParsedPlan;
  quality: PlanQualityReport;
}

const defaultVaultOptions = (): VaultOptions => {
  const config = loadConfig();
  return { ...config.vault, localModel: config.ollama.model };
};

/**
 * Service responsible for turning the coaching vault into a plan prompt,
 * and for checking the plans a model writes back.
 */
export class CoachPlanService {
  constructor(
    private readonly options: VaultOptions = defaultVaultOptions(),
    private readonly model: PlanModel | null = createPlanModel(),
    private readonly loader: VaultLoader = vaultLoader,
    private readonly profileParser: ProfileParserService = profileParserService
  ) {}

  get hasModel(): boolean {
    return this.model !== null;
  }

  settingsFor(overrides?: Partial<CoachSettings>, profile?: AthleteProfile): CoachSettings {
    const parsed = resolvedSettingsSchema.safeParse(resolveSettings(overrides, profile));
    if (!parsed.success) {
      throw new ValidationError(
        "Invalid coach settings",
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
      );
    }
    return parsed.data;
  }

  private startDateFor(value?: string): dayjs.Dayjs {
    if (value === undefined) {
      return dayjs();
    }
    const parsed = parseIsoDate(value);
    if (!parsed) {
      throw new ValidationError(`Invalid start date "${value}", expected YYYY-MM-DD`);
    }
    return parsed;
  }

  async loadProfile(): Promise<AthleteProfile> {
    return this.profileParser.loadAthleteProfile(this.options.dataDir);
  }

  async buildCoachPrompt(request: CoachRequest = {}): Promise<CoachPrompt> {
    const { dataDir, yamlDir, maxCharsPerFile, localModel } = this.options;
    const startDate = this.startDateFor(request.startDate);

    const profile = await this.profileParser.loadAthleteProfile(dataDir);
    const settings = this.settingsFor(request.settings, profile);

    const markdownContext = await this.loader.loadMarkdownContext(
      dataDir,
      DEFAULT_MD_FILES
    );
    const yamlContext = await this.loader.loadYamlContext(yamlDir, {
      maxFiles: request.maxYamlFiles ?? this.options.maxYamlFiles,
      maxCharsPerFile,
    });

    const prompt = buildPrompt({
      markdownContext,
      yamlContext,
      settings,
      profile,
      startDate,
    });
    logger.info(`[CoachPlan] - Built prompt of ${prompt.length} characters`);

    return {
      prompt,
      length: prompt.length,
      weekStarts: weekStartDates(startDate, settings.weeks),
      settings,
      profile,
      commands: ollamaCommands(localModel, request.promptFile ?? "prompt.txt"),
    };
  }

  async generatePlan(request: CoachRequest = {}): Promise<PlanResult> {
    const coachPrompt = await this.buildCoachPrompt(request);

    if (!this.model) {
      return {
        status: "prompt_only",
        reason: "No hosted model configured; run the prompt with a local model.",
        prompt: coachPrompt.prompt,
        commands: coachPrompt.commands,
      };
    }

    let raw: string;
    try {
      raw = await this.model.generate(coachPrompt.prompt);
    } catch (error) {
      logger.error(`[CoachPlan] - Plan model ${this.model.name} failed`, error);
      throw new UpstreamError(
        `Plan model ${this.model.name} failed: ${errorMessage(error)}`,
        error
      );
    }
    if (!raw.trim()) {
      throw new UpstreamError(`Plan model ${this.model.name} returned an empty answer`);
    }

    const { plan, quality } = this.inspect(raw, coachPrompt.settings);
    logger.info(
      `[CoachPlan] - Generated ${quality.totals.weeks}-week plan with ${quality.issues.length} issue(s)`
    );

    return {
      status: "generated",
      id: uuidv4(),
      model: this.model.name,
      promptLength: coachPrompt.length,
      raw,
      plan,
      quality,
    };
  }

  checkPlanText(text: string, overrides?: Partial<CoachSettings>): PlanCheck {
    return this.inspect(text, this.settingsFor(overrides));
  }

  private inspect(text: string, settings: CoachSettings): PlanCheck {
    const plan = parsePlan(text);
    return { plan, quality: checkPlanQuality(plan, settings) };
  }
}
