import type { ModelSource } from '../types.js';

export const COMMANDS = ['evaluate', 'analyze', 'extract'] as const;

export type Command = (typeof COMMANDS)[number];

export type ParsedArgs = {
  help: boolean;
  command?: Command;
  config?: string;
  groundTruth?: string;
  models: ModelSource[];
  inputDir?: string;
  files: string[];
  input?: string;
  output?: string;
  numLines?: number;
};

export const USAGE = `
WER benchmark

Usage:
  wer-bench <command> [options]

Commands:
  evaluate                   Score model transcripts against the ground truth
  analyze                    Summarize *_wer.csv files and compare models
  extract                    Split a delimited transcript list into <n>.txt files

Options:
  --config <path>            Config file (default: ./config.json)
  --ground-truth <dir>       evaluate: reference transcripts folder
  --model <name>=<folder>    evaluate: model output folder (repeatable)
  --input-dir <dir>          analyze: folder with *_wer.csv files
  --file <path>              analyze: score file to include (repeatable)
  --input <path>             extract: delimited transcript list
  --num-lines <n>            extract: stop after n transcripts
  --output <dir>             Output folder
  --help                     Show this message
`;

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseModel(value: string): ModelSource {
  const separator = value.indexOf('=');
  const name = separator > 0 ? value.slice(0, separator).trim() : '';
  const folder = separator > 0 ? value.slice(separator + 1).trim() : '';
  if (!name || !folder) {
    throw new Error(`--model expects <name>=<folder>, got ${value}`);
  }
  return { name, folder };
}

export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = { help: false, models: [], files: [] };

  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index];
    if (!raw.startsWith('--')) {
      if (result.command === undefined && isCommand(raw)) {
        result.command = raw;
        continue;
      }
      throw new Error(`Unexpected argument: ${raw}`);
    }

    const eq = raw.indexOf('=');
    const flag = eq === -1 ? raw : raw.slice(0, eq);
    const inlineValue = eq === -1 ? undefined : raw.slice(eq + 1);
    const name = flag.replace(/^--/, '');

    const getValue = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[index + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`${flag} requires a value`);
      }
      index += 1;
      return next;
    };

    switch (name) {
      case 'help':
        result.help = true;
        break;
      case 'config':
        result.config = getValue();
        break;
      case 'ground-truth':
        result.groundTruth = getValue();
        break;
      case 'model':
        result.models.push(parseModel(getValue()));
        break;
      case 'input-dir':
        result.inputDir = getValue();
        break;
      case 'file':
        result.files.push(getValue());
        break;
      case 'input':
        result.input = getValue();
        break;
      case 'output':
        result.output = getValue();
        break;
      case 'num-lines': {
        const value = Number(getValue());
        if (!Number.isInteger(value) || value < 1) {
          throw new Error('--num-lines must be a positive integer');
        }
        result.numLines = value;
        break;
      }
      default:
        throw new Error(`Unknown option: ${flag}`);
    }
  }

  return result;
}
