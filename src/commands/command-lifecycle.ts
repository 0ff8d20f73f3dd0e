/**
 * Command lifecycle: parse -> validate -> execute -> render -> exit code.
 *
 * Parsing and validation never touch the filesystem, so a usage error is
 * reported before any archive is opened.
 */

export interface CommandLifecycle<TParsed, TOutcome> {
  parse(rawArgs: readonly string[]): TParsed;
  /** Throws a UsageError to stop the run */
  validate(parsed: TParsed): void;
  execute(parsed: TParsed): Promise<TOutcome>;
  render(outcome: TOutcome): void;
  exitCode(outcome: TOutcome): number;
}

/** @returns the process exit code */
export async function runCommand<TParsed, TOutcome>(
  rawArgs: readonly string[],
  command: CommandLifecycle<TParsed, TOutcome>
): Promise<number> {
  const parsed = command.parse(rawArgs);
  command.validate(parsed);
  const outcome = await command.execute(parsed);
  command.render(outcome);
  return command.exitCode(outcome);
}
