#!/usr/bin/env node

import { handleExtractCommand } from './commands/extract-command';
import { handleHelpCommand } from './commands/help-command';
import { handleListExtensionsCommand } from './commands/list-extensions-command';
import { handleVersionCommand } from './commands/version-command';
import { hasAnyFlag } from './commands/option-scanner';
import { EXIT_OK, handleError, runCleanup } from './errors';
import { forwardSignals } from './utils/signal-forwarder';

const EARLY_COMMANDS: Array<{ flags: readonly string[]; run: () => void }> = [
  { flags: ['--help', '-h'], run: handleHelpCommand },
  { flags: ['--version'], run: handleVersionCommand },
  { flags: ['--list-extensions'], run: () => handleListExtensionsCommand() },
];

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  const early = EARLY_COMMANDS.find((command) => hasAnyFlag(args, command.flags));
  if (early) {
    early.run();
    return EXIT_OK;
  }

  const controller = new AbortController();
  const stopForwarding = forwardSignals(controller, {
    onForcedExit: () => {
      runCleanup();
      process.exit(130);
    },
  });
  try {
    return await handleExtractCommand(args, { signal: controller.signal });
  } finally {
    stopForwarding();
  }
}

// ========== Global Error Handlers ==========

process.on('uncaughtException', (error: Error) => {
  process.exit(handleError(error));
});

process.on('unhandledRejection', (reason: unknown) => {
  process.exit(handleError(reason));
});

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.exitCode = handleError(error);
  }
);
