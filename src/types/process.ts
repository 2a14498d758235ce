export interface CommandSpec {
  file: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export interface CommandOutcome {
  exitCode: number;
}

export interface CommandRunner {
  run(cmd: CommandSpec): Promise<CommandOutcome>;
}
