import * as fs from 'fs';
import * as yaml from 'yaml';
import type { z } from 'zod';
import {
  ArenaConfigSchema,
  TournamentConfigSchema,
  type ArenaConfig,
  type TournamentConfig,
} from './types.js';
import { logger } from './logger.js';
import { errorMessage } from './engine/errors.js';

function loadYaml<T>(configPath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T {
  logger.log({ type: 'SYSTEM', content: `Loading ${label} from ${configPath}` });

  try {
    const fileContents = fs.readFileSync(configPath, 'utf-8');
    const parsedYaml: unknown = yaml.parse(fileContents);
    const config = schema.parse(parsedYaml);

    logger.log({ type: 'SYSTEM', content: `${label[0]?.toUpperCase() ?? ''}${label.slice(1)} loaded and validated.` });
    return config;
  } catch (error) {
    logger.log({
      type: 'SYSTEM',
      content: `Failed to load ${label}: ${errorMessage(error)}`,
      metadata: { path: configPath },
    });
    throw error;
  }
}

export function loadConfig(configPath: string): ArenaConfig {
  return loadYaml(configPath, ArenaConfigSchema, 'configuration');
}

export function loadTournamentConfig(configPath: string): TournamentConfig {
  return loadYaml(configPath, TournamentConfigSchema, 'tournament configuration');
}
