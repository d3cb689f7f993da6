// ============================================
// VALLEY ECONOMY - Game Configuration Loader
// ============================================

import fs from 'fs';
import path from 'path';
import { gameConfigSchema } from '../schemas/config.schema.js';
import { ConfigValidationError } from '../plugins/error-handler.plugin.js';
import { DEFAULT_GAME_CONFIG } from './game.js';
import { deepFreeze } from '../utils/freeze.js';
import type { GameConfig } from '../models/types.js';

/**
 * Validate authored game data and freeze it. Throws ConfigValidationError
 * listing every problem.
 */
export function parseGameConfig(input: unknown, source = 'game config'): GameConfig {
  const result = gameConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigValidationError(`Invalid ${source}`, issues);
  }
  return deepFreeze(result.data);
}

/**
 * Load the game configuration from a JSON file, or the built-in defaults
 * when no path is given.
 */
export function loadGameConfig(configPath?: string): GameConfig {
  if (!configPath) {
    return parseGameConfig(DEFAULT_GAME_CONFIG, 'default game config');
  }

  const resolved = path.resolve(process.cwd(), configPath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError(`Could not read game config at ${resolved}`, [{ path: '', message: reason }]);
  }

  console.log(`[Config] Loaded game config from ${resolved}`);
  return parseGameConfig(raw, `game config at ${resolved}`);
}
