import fs from 'fs-extra';
import path from 'path';
import type { ZodIssue } from 'zod';
import { appConfigSchema, type AppConfig, type AppConfigInput, type FrameConfig, type MovementConfig } from './schema';
import { ConfigurationError, describeError } from '../utils/errors';
import { frameDiagonal } from '../utils/geometry';

function formatIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

export function resolveConfig(input: unknown = {}): AppConfig {
  const result = appConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid configuration', result.error.issues.map(formatIssue));
  }
  return result.data;
}

export function defaultConfig(): AppConfig {
  return resolveConfig({});
}

export async function loadConfig(configPath?: string): Promise<AppConfig> {
  if (!configPath) {
    return defaultConfig();
  }

  const resolved = path.resolve(configPath);
  if (!(await fs.pathExists(resolved))) {
    throw new ConfigurationError(`Configuration file not found: ${resolved}`);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(resolved);
  } catch (error) {
    throw new ConfigurationError(`Configuration file is not valid JSON: ${resolved}`, [describeError(error)]);
  }

  return resolveConfig(raw);
}

export function withOverrides(config: AppConfig, overrides: AppConfigInput): AppConfig {
  return resolveConfig({ ...config, ...overrides });
}

/** 移動速度の上限（px/分）。未設定ならフレーム対角線の半分。 */
export function maxSpeedPerMinute(movement: MovementConfig, frame: FrameConfig): number {
  return movement.maxSpeedPxPerMinute ?? frameDiagonal(frame.width, frame.height) / 2;
}
