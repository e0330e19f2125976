/**
 * In-process stand-ins for the logger, the AWS CLI subprocess and the
 * confirmation prompt.
 */

import type { CommandLine, DiagnosticLogger, InstanceDescription, ProcessOutput } from '../../types';
import type { ProcessExecutor } from '../../services/commandRunner';

export interface LogEntry {
  level: 'info' | 'success' | 'warn' | 'error' | 'debug' | 'step' | 'spinner';
  message: string;
  data?: unknown;
}

export class RecordingLogger implements DiagnosticLogger {
  readonly entries: LogEntry[] = [];

  info(message: string, data?: unknown): void {
    this.entries.push({ level: 'info', message, data });
  }

  success(message: string, data?: unknown): void {
    this.entries.push({ level: 'success', message, data });
  }

  warn(message: string, data?: unknown): void {
    this.entries.push({ level: 'warn', message, data });
  }

  error(message: string, error?: Error, data?: unknown): void {
    this.entries.push({ level: 'error', message, data: data ?? error?.message });
  }

  debug(message: string, data?: unknown): void {
    this.entries.push({ level: 'debug', message, data });
  }

  step(step: string, message: string, data?: unknown): void {
    this.entries.push({ level: 'step', message: `${step}: ${message}`, data });
  }

  timer(): { end: () => number } {
    return { end: () => 0 };
  }

  spinner(message: string) {
    this.entries.push({ level: 'spinner', message });
    return { stop: () => undefined };
  }

  messages(level: LogEntry['level']): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

export function instanceDescription(id: string, state: string, extra: Record<string, unknown> = {}): InstanceDescription {
  return {
    InstanceId: id,
    InstanceType: 't3.micro',
    State: { Name: state },
    ...extra
  };
}

/**
 * describe-instances output with one reservation per group
 */
export function describeOutput(...groups: InstanceDescription[][]): string {
  return JSON.stringify({
    Reservations: groups.map((instances) => ({ Instances: instances }))
  });
}

/**
 * Fake AWS CLI: each describe-instances call returns the next scripted output,
 * stop/start calls return a fixed acknowledgement. Every call is recorded.
 */
export class ScriptedAwsCli {
  readonly calls: CommandLine[] = [];
  private readonly describeOutputs: string[];

  constructor(describeOutputs: string[]) {
    this.describeOutputs = [...describeOutputs];
  }

  readonly executor: ProcessExecutor = async (command: CommandLine): Promise<ProcessOutput> => {
    this.calls.push(command);
    const action = command.args[1];
    if (action === 'describe-instances') {
      const next = this.describeOutputs.shift();
      if (next === undefined) {
        throw new Error('No scripted describe-instances output left');
      }
      return { stdout: next, exitCode: 0 };
    }
    return { stdout: `{"action": "${action}"}`, exitCode: 0 };
  };

  actions(): string[] {
    return this.calls.map((command) => command.args[1]);
  }
}
