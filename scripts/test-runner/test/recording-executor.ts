import type {
  CommandExecutor,
  ExecuteOptions,
  ExecutionResult,
  RunnerContext,
} from "../src/types";

export interface RecordedCall {
  command: string[];
  options: ExecuteOptions;
}

type Responder = (command: readonly string[]) => Partial<ExecutionResult>;

/** Executor that records each command and answers from a responder. */
export class RecordingExecutor implements CommandExecutor {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: Responder = () => ({})) {}

  run(command: readonly string[], options: ExecuteOptions = {}): ExecutionResult {
    this.calls.push({ command: [...command], options });
    return {
      exitCode: 0,
      stdout: "",
      stderr: "",
      durationMs: 0,
      ...this.respond(command),
    };
  }

  commands(): string[][] {
    return this.calls.map((call) => call.command);
  }
}

export function testContext(
  executor: CommandExecutor,
  cwd: string
): RunnerContext & { output: string[]; errors: string[] } {
  const output: string[] = [];
  const errors: string[] = [];
  return {
    cwd,
    python: "python3",
    executor,
    log: (message) => output.push(message),
    error: (message) => errors.push(message),
    output,
    errors,
  };
}
