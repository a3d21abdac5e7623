import { ConsoleJsonLogger } from '@cadencekit/core';
import { parseCliArgs } from './args.js';
import { loadCliEnv } from './config/env.js';
import type { CliDeps, CliIo } from './composition.js';
import { describeCliFailure, isDebugMode } from './errors.js';
import { ExitCode } from './exitCodes.js';
import { resetCommand } from './commands/reset.js';
import { runCommand } from './commands/run.js';
import { statusCommand } from './commands/status.js';

const consoleIo: CliIo = {
  // eslint-disable-next-line no-console
  out: (line) => console.log(line),
  // eslint-disable-next-line no-console
  err: (line) => console.error(line),
};

/** Run one CLI invocation and return its exit code. Never rejects. */
export async function executeCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const io = deps.io ?? consoleIo;
  try {
    const args = parseCliArgs(argv);
    const env = loadCliEnv(deps.env);
    const logger = deps.logger ?? new ConsoleJsonLogger({ level: env.logLevel });

    switch (args.command) {
      case 'run':
        return await runCommand(args, env, deps, io, logger);
      case 'status':
        return await statusCommand(args, env, deps, io, logger);
      case 'reset':
        return await resetCommand(args, env, deps, io, logger);
    }
  } catch (err) {
    io.err(JSON.stringify(describeCliFailure(err, isDebugMode(deps.env))));
    return ExitCode.ERROR;
  }
}
