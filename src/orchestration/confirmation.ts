import { confirm } from '@inquirer/prompts';
import type { Logger } from '../logging/logger';
import type { ConfirmationMode } from '../types';
import type { OrchestrationContext } from './context';

export interface ConfirmationGate {
  message: string;
  /** Answer assumed when the operator just presses enter. */
  defaultAnswer?: boolean;
}

/**
 * A gate is either fixed or computed from the live context, which lets a
 * stage ask only when it detects a conflict. Resolving to null means no gate.
 */
export type GateSource =
  | ConfirmationGate
  | ((ctx: OrchestrationContext) => Promise<ConfirmationGate | null>);

export type ConfirmFn = (gate: ConfirmationGate, stageName: string) => Promise<boolean>;

export interface Prompter {
  confirm(message: string, defaultAnswer: boolean): Promise<boolean>;
}

export class InquirerPrompter implements Prompter {
  constructor(private readonly logger: Logger, private readonly interactive: boolean = Boolean(process.stdin.isTTY)) {}

  async confirm(message: string, defaultAnswer: boolean): Promise<boolean> {
    if (!this.interactive) {
      this.logger.warn(`Cannot ask "${message}" without a terminal; treating as declined`);
      return false;
    }
    return confirm({ message, default: defaultAnswer });
  }
}

export class ConfirmationPolicy {
  constructor(
    readonly mode: ConfirmationMode,
    private readonly prompter: Prompter,
    private readonly logger: Logger
  ) {}

  async decide(gate: ConfirmationGate, stageName: string): Promise<boolean> {
    switch (this.mode) {
      case 'proceed':
        return true;
      case 'auto-approve':
        this.logger.info(`[${stageName}] auto-approved: ${gate.message}`);
        return true;
      case 'prompt': {
        const approved = await this.prompter.confirm(gate.message, gate.defaultAnswer ?? false);
        this.logger.debug(`[${stageName}] operator ${approved ? 'approved' : 'declined'}: ${gate.message}`);
        return approved;
      }
    }
  }

  asConfirmFn(): ConfirmFn {
    return (gate, stageName) => this.decide(gate, stageName);
  }
}

export async function resolveGate(source: GateSource | undefined, ctx: OrchestrationContext): Promise<ConfirmationGate | null> {
  if (source === undefined) {
    return null;
  }
  if (typeof source === 'function') {
    return source(ctx);
  }
  return source;
}

export function parseConfirmationMode(value: string): ConfirmationMode {
  if (value === 'proceed' || value === 'prompt' || value === 'auto-approve') {
    return value;
  }
  throw new Error(`Unknown confirmation mode "${value}". Expected proceed, prompt or auto-approve`);
}
