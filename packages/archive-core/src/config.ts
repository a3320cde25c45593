import * as fs from 'fs';
import { z } from 'zod';
import { isKnownEncoding } from './encoding';
import { ConfigError, errorMessage } from './errors';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

function defaultLogLevel(): z.infer<typeof LogLevelSchema> {
  const fromEnv = LogLevelSchema.safeParse(process.env.MAILSHELF_LOG_LEVEL);
  return fromEnv.success ? fromEnv.data : 'info';
}

export const SanitizerConfigSchema = z.object({
  stripScripts: z.boolean().default(true),
  stripEventHandlers: z.boolean().default(true),
  neutralizeJavascriptLinks: z.boolean().default(true),
  stripExternalImages: z.boolean().default(true),
  stripBase64Images: z.boolean().default(true),
  /** Serialized `<img>` tag length above which an inline data image is dropped */
  base64ImageMaxLength: z.number().int().min(1).default(1000),
  stripStyles: z.boolean().default(true),
  /** Full `style="..."` length above which the value is replaced */
  maxStyleAttributeLength: z.number().int().min(1).default(500),
  stripLinkElements: z.boolean().default(true),
  stripTrackingPixels: z.boolean().default(true),
});

const EncodingLabelSchema = z.string().min(1).refine(isKnownEncoding, { message: 'Unknown encoding' });

export const EncodingConfigSchema = z.object({
  primary: EncodingLabelSchema.default('utf-8'),
  fallback: EncodingLabelSchema.default('latin1'),
});

export const ArchiveConfigSchema = z.object({
  /** Index heading and page title suffix */
  archiveTitle: z.string().min(1).default('Mail Archive'),
  previewLength: z.number().int().min(1).default(200),
  progressInterval: z.number().int().min(1).default(100),
  emailsDirName: z.string().min(1).default('emails'),
  attachmentsDirName: z.string().min(1).default('attachments'),
  saveAttachments: z.boolean().default(true),
  logLevel: LogLevelSchema.default(defaultLogLevel()),
  encoding: EncodingConfigSchema.default({}),
  sanitizer: SanitizerConfigSchema.default({}),
});

export type ArchiveConfig = z.infer<typeof ArchiveConfigSchema>;
export type ArchiveConfigInput = z.input<typeof ArchiveConfigSchema>;
export type SanitizerConfig = z.infer<typeof SanitizerConfigSchema>;
export type EncodingConfig = z.infer<typeof EncodingConfigSchema>;

export const DEFAULT_CONFIG: ArchiveConfig = ArchiveConfigSchema.parse({});

function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}`, [errorMessage(err)]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, [errorMessage(err)]);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
  }
  return { ...parsed };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeDeep(
  base: Record<string, unknown>,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] =
      isPlainObject(current) && isPlainObject(value) ? mergeDeep(current, value) : value;
  }
  return merged;
}

/**
 * Build the run configuration: defaults, then the optional JSON file,
 * then explicit overrides (CLI flags).
 */
export function loadConfig(
  overrides: ArchiveConfigInput = {},
  filePath?: string
): ArchiveConfig {
  const fromFile = filePath ? readConfigFile(filePath) : {};
  const result = ArchiveConfigSchema.safeParse(mergeDeep(fromFile, { ...overrides }));
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}
