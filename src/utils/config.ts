import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { z } from 'zod';

export interface DetectorConfig {
  longFunctionLines: number;
  maxNestingDepth: number;
  maxParameters: number;
  maxLineLength: number;
  godClassMethods: number;
  duplicateBlockLines: number;
  secretEntropyThreshold: number;
  secretMinLength: number;
  disabledRules: string[];
}

export interface RecommendationConfig {
  styleTolerance: number;
  consistencyTolerance: number;
  trailingWhitespaceTolerance: number;
  docstringFloor: number;
  complexityCeiling: number;
  maxImports: number;
  summaryTopN: number;
}

export interface ProfileConfig {
  storeTimeoutMs: number;
  maxUpdateAttempts: number;
  historyLimit: number;
  storageDir: string;
}

export interface StylewiseConfig {
  detector: DetectorConfig;
  recommendation: RecommendationConfig;
  profile: ProfileConfig;
}

const CONFIG_FILE_NAMES = [
  'stylewise.config.yaml',
  'stylewise.config.yml',
  'stylewise.config.json',
  '.stylewiserc',
];

const DEFAULT_DETECTOR_CONFIG: DetectorConfig = {
  longFunctionLines: 50,
  maxNestingDepth: 4,
  maxParameters: 5,
  maxLineLength: 100,
  godClassMethods: 20,
  duplicateBlockLines: 3,
  secretEntropyThreshold: 4.0,
  secretMinLength: 20,
  disabledRules: [],
};

const DEFAULT_RECOMMENDATION_CONFIG: RecommendationConfig = {
  styleTolerance: 0.25,
  consistencyTolerance: 0.2,
  trailingWhitespaceTolerance: 0.1,
  docstringFloor: 0.5,
  complexityCeiling: 10,
  maxImports: 10,
  summaryTopN: 5,
};

const DEFAULT_PROFILE_CONFIG: ProfileConfig = {
  storeTimeoutMs: 2000,
  maxUpdateAttempts: 50,
  historyLimit: 20,
  storageDir: path.join('.stylewise', 'profiles'),
};

const positiveInt = z.number().int().positive();
const ratio = z.number().min(0).max(1);

const configFileSchema = z.object({
  detector: z.object({
    longFunctionLines: positiveInt,
    maxNestingDepth: positiveInt,
    maxParameters: positiveInt,
    maxLineLength: positiveInt,
    godClassMethods: positiveInt,
    duplicateBlockLines: z.number().int().min(2),
    secretEntropyThreshold: z.number().positive(),
    secretMinLength: positiveInt,
    disabledRules: z.array(z.string()),
  }).partial().optional(),
  recommendation: z.object({
    styleTolerance: ratio,
    consistencyTolerance: ratio,
    trailingWhitespaceTolerance: ratio,
    docstringFloor: ratio,
    complexityCeiling: positiveInt,
    maxImports: positiveInt,
    summaryTopN: positiveInt,
  }).partial().optional(),
  profile: z.object({
    storeTimeoutMs: positiveInt,
    maxUpdateAttempts: positiveInt,
    historyLimit: z.number().int().min(0),
    storageDir: z.string().min(1),
  }).partial().optional(),
});

export type StylewiseConfigOverrides = z.infer<typeof configFileSchema>;

export class ConfigError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(baseDir: string): StylewiseConfig {
  for (const fileName of CONFIG_FILE_NAMES) {
    const filePath = path.join(baseDir, fileName);
    if (fs.existsSync(filePath)) {
      const content = fs.readFileSync(filePath, 'utf-8');
      const parsed: unknown = fileName.endsWith('.json')
        ? JSON.parse(content)
        : yaml.parse(content);
      const result = configFileSchema.safeParse(parsed ?? {});
      if (!result.success) {
        const detail = result.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ');
        throw new ConfigError(`Invalid configuration in ${fileName}: ${detail}`, filePath);
      }
      return mergeWithDefaults(result.data);
    }
  }
  return getDefaultConfig();
}

export function getDefaultConfig(): StylewiseConfig {
  return {
    detector: { ...DEFAULT_DETECTOR_CONFIG, disabledRules: [] },
    recommendation: { ...DEFAULT_RECOMMENDATION_CONFIG },
    profile: { ...DEFAULT_PROFILE_CONFIG },
  };
}

export function mergeWithDefaults(partial: StylewiseConfigOverrides): StylewiseConfig {
  return {
    detector: { ...DEFAULT_DETECTOR_CONFIG, ...partial.detector },
    recommendation: { ...DEFAULT_RECOMMENDATION_CONFIG, ...partial.recommendation },
    profile: { ...DEFAULT_PROFILE_CONFIG, ...partial.profile },
  };
}

export function saveConfig(baseDir: string, config: StylewiseConfig): void {
  const filePath = path.join(baseDir, 'stylewise.config.yaml');
  fs.writeFileSync(filePath, yaml.stringify(config), 'utf-8');
}
