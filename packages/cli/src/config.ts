import fs from "fs/promises";
import { z } from "zod";
import { DEFAULT_NOISE_RULES, type NoiseRule } from "./text-cleanup";

export type SectionLabels = {
  requestParameters: string[];
  responseParameters: string[];
  errors: string[];
  requestExample: string[];
  responseExample: string[];
  method: string[];
  accessLevel: string[];
  description: string[];
};

export type ExtractionConfig = {
  headingTags: string[];
  labels: SectionLabels;
  requiredTokens: string[];
  noiseRules: NoiseRule[];
  breadcrumb: {
    maxLength: number;
    boilerplate: string[];
  };
  domainMappings: Record<string, string>;
};

export const DEFAULT_CONFIG: ExtractionConfig = {
  headingTags: ["h3", "h4", "h5"],
  labels: {
    requestParameters: ["Параметры запроса", "Request parameters"],
    responseParameters: ["Параметры ответа", "Response parameters"],
    errors: ["Список возвращаемых ошибок", "Errors"],
    requestExample: ["Пример запроса", "Request example"],
    responseExample: ["Пример ответа", "Response example"],
    method: ["Метод", "Method"],
    accessLevel: ["Кому доступен", "Access"],
    description: ["Описание", "Description"],
  },
  requiredTokens: ["да", "yes", "true"],
  noiseRules: DEFAULT_NOISE_RULES,
  breadcrumb: {
    maxLength: 120,
    boilerplate: ["Главная", "Home", "Документация", "Documentation", "API"],
  },
  domainMappings: {},
};

const labelList = z.array(z.string().min(1)).min(1);

const NoiseRuleSchema = z
  .object({
    pattern: z.string().min(1),
    flags: z.string().regex(/^[gimsuy]*$/).default("gi"),
    replacement: z.string().default(""),
  })
  .transform((rule, ctx): NoiseRule => {
    try {
      return {
        pattern: new RegExp(rule.pattern, rule.flags),
        replacement: rule.replacement,
      };
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid pattern: ${error instanceof Error ? error.message : String(error)}`,
      });
      return z.NEVER;
    }
  });

export const ConfigFileSchema = z
  .object({
    headingTags: z.array(z.string().regex(/^h[1-6]$/)).min(1),
    labels: z
      .object({
        requestParameters: labelList,
        responseParameters: labelList,
        errors: labelList,
        requestExample: labelList,
        responseExample: labelList,
        method: labelList,
        accessLevel: labelList,
        description: labelList,
      })
      .partial(),
    requiredTokens: z.array(z.string().min(1)).min(1),
    noiseRules: z.array(NoiseRuleSchema),
    breadcrumb: z
      .object({
        maxLength: z.number().int().positive(),
        boilerplate: z.array(z.string()),
      })
      .partial(),
    domainMappings: z.record(z.string()),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function mergeConfig(
  base: ExtractionConfig,
  overrides: ConfigFile,
): ExtractionConfig {
  return {
    headingTags: overrides.headingTags ?? base.headingTags,
    labels: { ...base.labels, ...overrides.labels },
    requiredTokens: (overrides.requiredTokens ?? base.requiredTokens).map(
      token => token.trim().toLowerCase(),
    ),
    noiseRules: overrides.noiseRules ?? base.noiseRules,
    breadcrumb: { ...base.breadcrumb, ...overrides.breadcrumb },
    domainMappings: { ...base.domainMappings, ...overrides.domainMappings },
  };
}

export function parseConfig(raw: unknown): ExtractionConfig {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return mergeConfig(DEFAULT_CONFIG, result.data);
}

export async function loadConfigFile(
  filePath: string,
): Promise<ExtractionConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, "utf-8"));
  } catch (error) {
    throw new Error(
      `Failed to read configuration from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseConfig(raw);
}

export const ProgramOptionsSchema = z.object({
  output: z.string().min(1),
  format: z.enum(["yaml", "json", "markdown"]),
  bundle: z.string().min(1).optional(),
  concurrency: z.number().int().min(1).max(64),
  config: z.string().min(1).optional(),
  report: z.boolean().default(false),
  verify: z.boolean().default(false),
  debug: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type ProgramOptions = z.infer<typeof ProgramOptionsSchema>;

export function parseProgramOptions(raw: unknown): ProgramOptions {
  const result = ProgramOptionsSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `--${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid options: ${details}`);
  }
  return result.data;
}
