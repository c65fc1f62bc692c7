import type { CommandOptions, CommandResult, CommandRunner } from '../types';

export interface RecordedCall {
  command: string;
  args: string[];
  options: CommandOptions;
}

type Responder = (call: RecordedCall) => Partial<CommandResult> | undefined;

/**
 * In-process CommandRunner. Responders are tried in order; the first one
 * that returns a result answers the call, anything unmatched exits 0.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly responders: Responder[] = [];

  on(match: string, result: Partial<CommandResult>): this {
    this.responders.push(call => (commandLine(call).startsWith(match) ? result : undefined));
    return this;
  }

  respond(responder: Responder): this {
    this.responders.push(responder);
    return this;
  }

  async run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const call = { command, args, options };
    this.calls.push(call);
    for (const responder of this.responders) {
      const result = responder(call);
      if (result) {
        return { code: 0, stdout: '', stderr: '', ...result };
      }
    }
    return { code: 0, stdout: '', stderr: '' };
  }

  lines(): string[] {
    return this.calls.map(commandLine);
  }
}

export function commandLine(call: Pick<RecordedCall, 'command' | 'args'>): string {
  return [call.command, ...call.args].join(' ');
}
