import { Command, CommanderError } from 'commander';
import type { AppConfig } from './config';
import { removePrefix } from './services/remove-prefix';
import log, { setVerbose } from './utils/logger';
import { askForInput, isPromptExit } from './utils/prompt';

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  onInputRequired: (prompt: string) => Promise<string>;
}

interface RemovePrefixCommandOptions {
  dir: string;
  dryRun: boolean;
  yes: boolean;
  excludeDirs: string;
  exts: string;
  verbose: boolean;
}

export const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  onInputRequired: askForInput,
};

/** 用户取消确认时的退出码 */
export const EXIT_CANCELLED = 130;

// 兼容单横线的长参数写法，如 -dir、-dry-run、-dir=PATH
const LONG_FLAGS = ['dir', 'dry-run', 'yes', 'exclude-dirs', 'exts', 'verbose'];
const BOOLEAN_FLAGS = ['dry-run', 'yes', 'y', 'verbose'];
const TRUE_VALUES = ['1', 't', 'true'];
const FALSE_VALUES = ['0', 'f', 'false'];

function toFlag(name: string): string {
  return name.length === 1 ? `-${name}` : `--${name}`;
}

/**
 * 单横线长参数改为双横线；布尔参数的 -flag=true / -flag=false 展开为有无该参数
 */
export function normalizeFlags(args: readonly string[]): string[] {
  return args.flatMap((arg) => {
    if (!arg.startsWith('-')) {
      return [arg];
    }

    const body = arg.replace(/^--?/, '');
    const separator = body.indexOf('=');
    const name = separator < 0 ? body : body.slice(0, separator);

    if (separator >= 0 && BOOLEAN_FLAGS.includes(name)) {
      const value = body.slice(separator + 1).toLowerCase();
      if (TRUE_VALUES.includes(value)) return [toFlag(name)];
      if (FALSE_VALUES.includes(value)) return [];
    }

    if (!arg.startsWith('--') && LONG_FLAGS.includes(name)) {
      return [`-${arg}`];
    }
    return [arg];
  });
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

export function usage(config: AppConfig): string {
  const bin = config.binName;
  return [
    `${config.displayName} - ${config.description} v${config.version}`,
    '',
    `Usage: ${bin} <command> [options]`,
    '',
    'Available commands:',
    '  removeprefix     Remove common prefix from filenames',
    '  version          Show version information',
    '  help             Show help information',
    '',
    `Use '${bin} <command> -h' for detailed help on a command`,
    '',
  ].join('\n');
}

function createRemovePrefixCommand(config: AppConfig, io: CliIo): Command {
  const { defaults } = config;

  return new Command('removeprefix')
    .description('Recursively traverse directories and remove common prefixes from filenames')
    .option('--dir <path>', 'Directory path to process', defaults.dir)
    .option('--dry-run', "Preview mode, don't actually rename files", false)
    .option('-y, --yes', 'Auto-confirm all operations without asking', false)
    .option('--exclude-dirs <list>', 'Comma-separated directory names to skip', defaults.excludeDirs.join(','))
    .option('--exts <list>', 'Comma-separated file extensions to include, all files when empty', defaults.extensions.join(','))
    .option('--verbose', 'Print diagnostic logs', false)
    .addHelpText(
      'after',
      [
        '',
        'Examples:',
        `  ${config.binName} removeprefix -dir /path/to/music -dry-run`,
        `  ${config.binName} removeprefix -dir /path/to/music -y`,
        `  ${config.binName} removeprefix -dir /path/to/music -exts mp3,flac -exclude-dirs @eaDir,.git`,
      ].join('\n'),
    )
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
    })
    .action(async (options: RemovePrefixCommandOptions) => {
      setVerbose(options.verbose);

      const summary = await removePrefix({
        directory: options.dir,
        dryRun: options.dryRun,
        autoConfirm: options.yes,
        excludeDirs: splitList(options.excludeDirs),
        extensions: splitList(options.exts),
        boundaryChars: config.boundaryChars,
        previewCount: config.previewCount,
        onProgress: (message) => io.stdout(`${message}\n`),
        onError: (message) => io.stderr(`${message}\n`),
        onInputRequired: io.onInputRequired,
      });

      log.debug(
        `renamed ${summary.renamed}, failed ${summary.failed}, declined ${summary.declined} ` +
          `(${summary.totalFiles} files in ${summary.directories} directories)`,
      );
    });
}

async function runRemovePrefix(args: readonly string[], config: AppConfig, io: CliIo): Promise<number> {
  const command = createRemovePrefixCommand(config, io);

  try {
    await command.parseAsync(normalizeFlags(args), { from: 'user' });
    return 0;
  } catch (error) {
    // 帮助信息和参数错误已由 commander 输出
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (isPromptExit(error)) {
      io.stderr('Cancelled\n');
      return EXIT_CANCELLED;
    }
    const errorMessage = error instanceof Error ? error.message : String(error);
    io.stderr(`Error: ${errorMessage}\n`);
    return 1;
  }
}

/**
 * 命令行入口，返回进程退出码
 */
export async function runCli(args: readonly string[], config: AppConfig, io: CliIo = defaultIo): Promise<number> {
  if (args.length === 0) {
    io.stderr(usage(config));
    return 1;
  }

  const [command, ...rest] = args;

  switch (command) {
    case 'removeprefix':
      return runRemovePrefix(rest, config, io);
    case 'version':
      io.stdout(`${config.displayName} v${config.version}\n`);
      return 0;
    case 'help':
    case '-h':
    case '--help':
      io.stderr(usage(config));
      return 0;
    default:
      io.stderr(`Error: unknown command '${command}'\n\n`);
      io.stderr(usage(config));
      return 1;
  }
}
