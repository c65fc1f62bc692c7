// Configuration-specific types
import type { OrchestratorConfig } from '../types';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<OrchestratorConfig>;
  validate(config: unknown): ConfigValidationResult;
}

export type RawConfig = Record<string, unknown>;
