import util from 'node:util';
import vm from 'node:vm';
import { isRecord } from '../utils/guards.js';

/** Discord のメッセージ上限 */
export const MESSAGE_LIMIT = 2000;

const RUN_TIMEOUT_MS = 2000;

export const SENSITIVE_VALUE_NOTICE = '⛔ Your code attempted to display a sensitive value(s)!';
export const EVAL_OVERFLOW_NOTICE = "🖐 The resulting message exceeds Discord's character limit!";

export type EvalOutcome =
  | { kind: 'value'; text: string }
  | { kind: 'none' }
  | { kind: 'error'; text: string }
  | { kind: 'redacted' };

/** 別 realm のエラーは instanceof Error にならない */
function describeError(error: unknown): string {
  if (isRecord(error) && typeof error['message'] === 'string') {
    const name = typeof error['name'] === 'string' ? error['name'] : 'Error';
    return `${name}: ${error['message']}`;
  }
  return `Uncaught ${util.inspect(error)}`;
}

function inspect(value: unknown): string {
  return typeof value === 'string' ? util.inspect(value) : util.inspect(value, { depth: 2, breakLength: 80 });
}

/**
 * Runs code in an isolated vm context. The context is kept between calls so bindings persist.
 * This is not a security boundary.
 */
export class Sandbox {
  private context: vm.Context;
  private sensitiveValues: string[];
  private printed: string[] = [];

  constructor(sensitiveValues: string[]) {
    this.sensitiveValues = sensitiveValues.filter((value) => value.length > 0);
    const print = (...args: unknown[]): void => {
      this.printed.push(args.map((arg) => (typeof arg === 'string' ? arg : inspect(arg))).join(' '));
    };
    this.context = vm.createContext({ print, console: { log: print, info: print, error: print } });
  }

  private redact(text: string): EvalOutcome {
    return this.sensitiveValues.some((value) => text.includes(value)) ? { kind: 'redacted' } : { kind: 'value', text };
  }

  /**
   * Output of print() calls wins over the completion value
   */
  run(code: string): EvalOutcome {
    this.printed = [];
    let value: unknown;
    try {
      value = vm.runInContext(code, this.context, { timeout: RUN_TIMEOUT_MS, filename: 'repl' });
    } catch (error) {
      return { kind: 'error', text: describeError(error) };
    }
    if (this.printed.length > 0) {
      return this.redact(this.printed.join('\n'));
    }
    if (value === undefined) return { kind: 'none' };
    return this.redact(inspect(value));
  }
}

/**
 * `%eval` output: the echoed input and its result in one code block
 */
export function formatEval(expression: string, outcome: EvalOutcome): string {
  const input = `>>> ${expression}`;
  switch (outcome.kind) {
    case 'value':
      return `\`\`\`${input}\n${outcome.text}\`\`\``;
    case 'none':
      return `\`\`\`${input}\nundefined\`\`\``;
    case 'error':
      return `\`\`\`${input}\`\`\`${outcome.text}`;
    case 'redacted':
      return `\`\`\`${input}\`\`\`${SENSITIVE_VALUE_NOTICE}`;
  }
}

export function evalOverflowMessage(expression: string): string {
  return `\`\`\`${`>>> ${expression}`.slice(0, 1950)}\`\`\`${EVAL_OVERFLOW_NOTICE}`;
}

export type ReplEnd = 'exited' | 'timeout' | 'overflow';

export const REPL_RUNNING_FOOTER = 'Exit at any time by entering `exit()`';

const REPL_END_FOOTERS: Record<ReplEnd, string> = {
  exited: 'You have exited the REPL session.',
  timeout: '⌛ Your session timed out from inactivity!',
  overflow: "⚠ Your session has exceeded Discord's character limit!",
};

/**
 * One user's REPL transcript in one channel
 */
export class ReplSession {
  readonly header: string;
  private sandbox: Sandbox;
  private code = '';

  constructor(header: string, sandbox: Sandbox) {
    this.header = header;
    this.sandbox = sandbox;
  }

  /** 次の入力を待てる長さか */
  get fits(): boolean {
    return this.header.length + this.code.length + 6 + REPL_RUNNING_FOOTER.length <= MESSAGE_LIMIT;
  }

  /**
   * Returns true when the input ends the session
   */
  submit(input: string): boolean {
    this.code += `\n>>> ${input}`;
    if (input.trim() === 'exit()') return true;
    const outcome = this.sandbox.run(input);
    switch (outcome.kind) {
      case 'value':
      case 'error':
        this.code += `\n${outcome.text}`;
        break;
      case 'redacted':
        this.code += `\n${SENSITIVE_VALUE_NOTICE}`;
        break;
      case 'none':
        break;
    }
    return false;
  }

  render(end?: ReplEnd): string {
    if (end === undefined) {
      return this.code === ''
        ? `${this.header}\n${REPL_RUNNING_FOOTER}`
        : `${this.header}\`\`\`${this.code}\`\`\`${REPL_RUNNING_FOOTER}`;
    }
    const footer = REPL_END_FOOTERS[end];
    let code = this.code;
    if (end === 'overflow') {
      code = `${code.slice(0, MESSAGE_LIMIT - 7 - this.header.length - footer.length)}…`;
    }
    return code === '' ? `${this.header}${footer}` : `${this.header}\`\`\`${code}\`\`\`${footer}`;
  }
}
