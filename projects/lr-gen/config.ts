import { err, ok, type Result } from 'neverthrow';
import type { ParserType } from '../lr/parsing-table.js';
import { DEFAULT_MAX_STEPS } from '../lr/LR-parser.js';
import type { TokenizerMode } from './tokenizer.js';

export type LRConfig = {
  parserType: ParserType;
  /**
   * Start symbol. Defaults to the left hand side of the first rule.
   */
  start?: string;
  maxSteps: number;
  tokenizer: TokenizerMode;
};

export const DEFAULT_CONFIG: Readonly<LRConfig> = {
  parserType: 'slr1',
  maxSteps: DEFAULT_MAX_STEPS,
  tokenizer: 'simple',
};

/**
 * Unparsed settings, as they come from the environment or the command
 * line.
 */
export type RawConfig = {
  type?: string;
  start?: string;
  maxSteps?: string | number;
  tokenizer?: string;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(`ConfigError: ${message}`);
    this.name = 'ConfigError';
  }
}

export function isParserType(value: string): value is ParserType {
  return value === 'lr0' || value === 'slr1';
}

function isTokenizerMode(value: string): value is TokenizerMode {
  return value === 'simple' || value === 'longest';
}

export function fromEnv(env: NodeJS.ProcessEnv = process.env): RawConfig {
  return {
    type: env.LR_PARSER_TYPE,
    start: env.LR_START,
    maxSteps: env.LR_MAX_STEPS,
    tokenizer: env.LR_TOKENIZER,
  };
}

/**
 * Resolve a configuration from defaults, then each source in turn.
 * Later sources win; settings a source leaves undefined are skipped.
 */
export function loadConfig(
  ...sources: RawConfig[]
): Result<LRConfig, ConfigError> {
  const config: LRConfig = { ...DEFAULT_CONFIG };
  for (const source of sources) {
    if (source.type !== undefined) {
      if (!isParserType(source.type)) {
        return err(
          new ConfigError(
            `parser type must be 'lr0' or 'slr1', got '${source.type}'`
          )
        );
      }
      config.parserType = source.type;
    }
    if (source.start !== undefined) {
      config.start = source.start;
    }
    if (source.maxSteps !== undefined) {
      const maxSteps = Number(source.maxSteps);
      if (!Number.isInteger(maxSteps) || maxSteps <= 0) {
        return err(
          new ConfigError(
            `max steps must be a positive integer, got '${source.maxSteps}'`
          )
        );
      }
      config.maxSteps = maxSteps;
    }
    if (source.tokenizer !== undefined) {
      if (!isTokenizerMode(source.tokenizer)) {
        return err(
          new ConfigError(
            `tokenizer must be 'simple' or 'longest', got '${source.tokenizer}'`
          )
        );
      }
      config.tokenizer = source.tokenizer;
    }
  }
  return ok(config);
}
