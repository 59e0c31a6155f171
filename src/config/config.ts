import { z } from "zod";
import { CellwidthError } from "../core/error.ts";
import {
  UNICODE_VERSION,
  isSupportedUnicodeVersion,
  parseUnicodeVersion,
} from "../unicode/version.ts";

const defaultConfig = {
  unicodeVersion: UNICODE_VERSION,
  ambiguousWidth: "auto",
  logLevel: "info",
} as const;

const VERSION_PATTERN = /^\d+(\.\d+){0,2}$/;

function isSupportedVersionText(text: string): boolean {
  return VERSION_PATTERN.test(text) && isSupportedUnicodeVersion(parseUnicodeVersion(text));
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = z.object({
  CELLWIDTH_UCD_PATH: z.string().min(1).optional(),
  CELLWIDTH_UNICODE_VERSION: z
    .string()
    .regex(VERSION_PATTERN, "expected a version such as 15.1.0")
    .refine(isSupportedVersionText, "expected a supported Unicode release, 11.0.0 or later")
    .optional()
    .default(defaultConfig.unicodeVersion),
  CELLWIDTH_AMBIGUOUS_WIDTH: z
    .enum(["narrow", "wide", "auto"])
    .optional()
    .default(defaultConfig.ambiguousWidth),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional().default(defaultConfig.logLevel),
  LC_ALL: z.string().optional(),
  LC_CTYPE: z.string().optional(),
  LANG: z.string().optional(),
});

export type AmbiguousWidthSetting = "narrow" | "wide" | "auto";

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * CellwidthConfig is the validated environment configuration.
 */
export interface CellwidthConfig {
  ucdPath: string | undefined;
  unicodeVersion: string;
  ambiguousWidthSetting: AmbiguousWidthSetting;
  ambiguousWidth: 1 | 2;
  logLevel: LogLevel;
}

export type Environment = Record<string, string | undefined>;

const CJK_LANGUAGES = new Set(["zh", "ja", "ko"]);

/**
 * Locale named by the first non-empty of LC_ALL, LC_CTYPE and LANG.
 */
export function localeOf(env: Environment): string | undefined {
  for (const key of ["LC_ALL", "LC_CTYPE", "LANG"]) {
    const value = env[key];
    if (value !== undefined && value !== "") return value;
  }
  return undefined;
}

/**
 * Whether a POSIX locale such as `ja_JP.UTF-8` is Chinese, Japanese or Korean.
 */
export function isCjkLocale(locale: string): boolean {
  const language = locale.toLowerCase().split(/[_.@-]/)[0] ?? "";
  return CJK_LANGUAGES.has(language);
}

/**
 * Columns for East_Asian_Width=Ambiguous. `auto` is wide under a CJK locale.
 */
export function resolveAmbiguousWidth(setting: AmbiguousWidthSetting, env: Environment): 1 | 2 {
  if (setting === "narrow") return 1;
  if (setting === "wide") return 2;
  const locale = localeOf(env);
  return locale !== undefined && isCjkLocale(locale) ? 2 : 1;
}

/**
 * Read and validate configuration from environment variables.
 */
export function loadConfig(env: Environment = process.env): CellwidthConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      variable: issue.path.join("."),
      message: issue.message,
    }));
    throw new CellwidthError(
      "CONFIG_INVALID",
      `Invalid configuration: ${issues.map((issue) => `${issue.variable}: ${issue.message}`).join("; ")}`,
      { issues },
    );
  }
  const data = parsed.data;
  return {
    ucdPath: data.CELLWIDTH_UCD_PATH,
    unicodeVersion: data.CELLWIDTH_UNICODE_VERSION,
    ambiguousWidthSetting: data.CELLWIDTH_AMBIGUOUS_WIDTH,
    ambiguousWidth: resolveAmbiguousWidth(data.CELLWIDTH_AMBIGUOUS_WIDTH, data),
    logLevel: data.LOG_LEVEL,
  };
}
