import { Command, CommanderError } from 'commander';

import { AppError } from '../../shared/errors/AppError.js';
import { ERROR_CODES, ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import { CLI_VERSION } from '../../shared/version.js';
import { registerAdminCommands } from './commands/admin.js';
import { registerLeaseCommands } from './commands/lease.js';
import { registerLedgerCommands } from './commands/ledger.js';
import { resolveCommandContext, type CommandContext, type GlobalOptions } from './context.js';
import { describeCommand, toDescribeResponse } from './describe.js';
import { mapExitCode, toFailureEnvelope } from './errors.js';
import { writeDiagnostic, writeResponse, type RenderableResponse } from './output.js';

export type ProgramResult = {
  exitCode: number;
};

const DESCRIBE_DISPLAYED = 'nlr.describeDisplayed';

const COMMANDER_HELP_CODES = new Set(['commander.helpDisplayed', 'commander.version', DESCRIBE_DISPLAYED]);

const formatHelpText = (command: Command): string => {
  const help = command.helpInformation();
  return help.endsWith('\n') ? help : `${help}\n`;
};

const writeCommandHelp = (command: Command, stream: 'stdout' | 'stderr'): void => {
  const help = formatHelpText(command);
  if (stream === 'stdout') {
    process.stdout.write(help);
    return;
  }

  process.stderr.write(help);
};

const findDirectSubcommand = (command: Command, token: string): Command | null => {
  for (const subcommand of command.commands) {
    if (subcommand.name() === token || subcommand.aliases().includes(token)) {
      return subcommand;
    }
  }

  return null;
};

// Global options taking a value; their values must not be mistaken for a command name.
const VALUE_OPTIONS = new Set(['--output', '--home', '--as', '--now']);

const resolveHelpTarget = (program: Command, argv: string[], lastActionCommand: Command | null): Command => {
  if (lastActionCommand) {
    return lastActionCommand;
  }

  const tokens = argv.slice(2);
  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index] ?? '';
    if (token.startsWith('-')) {
      if (VALUE_OPTIONS.has(token)) {
        index += 1;
      }
      continue;
    }
    return findDirectSubcommand(program, token) ?? program;
  }

  return program;
};

const stripCommanderPrefix = (message: string): string => message.replace(/^error:\s*/i, '').trim();

const applyCommanderParsingConfig = (command: Command): void => {
  command.exitOverride();
  command.configureOutput({
    writeOut: (str) => {
      process.stdout.write(str);
    },
    writeErr: () => {
      // Parse errors are rendered as envelopes by runProgram().
    },
    outputError: () => {
      // Parse errors are rendered as envelopes by runProgram().
    }
  });

  for (const subcommand of command.commands) {
    applyCommanderParsingConfig(subcommand);
  }
};

const outputFormatOf = (program: Command): 'json' | 'text' =>
  program.opts<GlobalOptions>().output === 'json' ? 'json' : 'text';

export const createProgram = (): Command => {
  const program = new Command();

  program
    .name('nlr')
    .description('Name lease registry: claim, renew and administer leased names')
    .version(CLI_VERSION)
    .option('--output <format>', 'output format: json|text', 'text')
    .option('--home <path>', 'registry home directory (default: $NLR_HOME or ~/.nlr)')
    .option('--as <identity>', 'caller identity (default: $NLR_IDENTITY)')
    .option('--now <seconds>', 'unix time to evaluate leases at (default: system clock)')
    .option('--describe', 'show payload schema and examples for a command')
    .option('--debug', 'print diagnostics to stderr for errors')
    .allowExcessArguments(false);
  program.helpCommand(false);

  const getContext = (): CommandContext => resolveCommandContext(program.opts<GlobalOptions>());

  const onResponse = async (response: RenderableResponse): Promise<void> => {
    writeResponse(response, getContext().output);
  };

  // Runs before the subcommand parses its own arguments, so `nlr claim --describe` needs none.
  program.hook('preSubcommand', async (_thisCommand, subcommand) => {
    if (!program.opts<GlobalOptions>().describe) {
      return;
    }
    await onResponse(toDescribeResponse(describeCommand(subcommand.name())));
    throw new CommanderError(0, DESCRIBE_DISPLAYED, '(describe)');
  });

  registerAdminCommands(program, getContext, onResponse);
  registerLeaseCommands(program, getContext, onResponse);
  registerLedgerCommands(program, getContext, onResponse);

  program
    .command('help [command]')
    .description('display help for command')
    .action(async (commandName?: string) => {
      if (!commandName) {
        writeCommandHelp(program, 'stdout');
        return;
      }

      const target = findDirectSubcommand(program, commandName);
      if (!target) {
        throw new AppError(`Unknown command: ${commandName}`, {
          code: ERROR_CODE.VALIDATION_ERROR,
          suggestions: ['Run: nlr --help']
        });
      }

      writeCommandHelp(target, 'stdout');
    });

  program
    .command('errors')
    .description('List the error codes this CLI reports')
    .action(async () => {
      await onResponse({
        id: 'errors-list',
        ok: true,
        data: { codes: [...ERROR_CODES] },
        meta: { durationMs: 0 },
        text: ERROR_CODES.join('\n')
      });
    });

  program.action(async () => {
    if (program.opts<GlobalOptions>().describe) {
      await onResponse(toDescribeResponse(describeCommand(null)));
      return;
    }

    writeCommandHelp(program, 'stdout');
  });

  return program;
};

export const runProgram = async (argv: string[]): Promise<ProgramResult> => {
  const program = createProgram();
  let lastActionCommand: Command | null = null;

  applyCommanderParsingConfig(program);
  program.hook('preAction', (_thisCommand, actionCommand) => {
    lastActionCommand = actionCommand;
  });

  try {
    await program.parseAsync(argv);
    return { exitCode: 0 };
  } catch (error) {
    const output = outputFormatOf(program);
    const debug = program.opts<GlobalOptions>().debug ?? false;

    if (error instanceof CommanderError) {
      if (COMMANDER_HELP_CODES.has(error.code)) {
        return { exitCode: 0 };
      }

      const envelope = toFailureEnvelope(
        'local-error',
        new AppError(stripCommanderPrefix(error.message), { code: ERROR_CODE.VALIDATION_ERROR })
      );
      if (debug) {
        writeDiagnostic(error.stack ?? error.message);
      }
      writeResponse(envelope, output);
      writeCommandHelp(resolveHelpTarget(program, argv, lastActionCommand), 'stderr');
      return { exitCode: mapExitCode(ERROR_CODE.VALIDATION_ERROR) };
    }

    const envelope = toFailureEnvelope('local-error', error);

    if (debug) {
      writeDiagnostic(error instanceof Error ? error.stack ?? error.message : String(error));
    }

    writeResponse(envelope, output);
    if (envelope.error?.code === ERROR_CODE.VALIDATION_ERROR) {
      writeCommandHelp(resolveHelpTarget(program, argv, lastActionCommand), 'stderr');
    }

    return { exitCode: mapExitCode(envelope.error?.code ?? ERROR_CODE.INTERNAL_ERROR) };
  }
};
