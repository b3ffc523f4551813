import { OUTPUT_FORMATS, OutputFormat, MixConfiguration } from '../types/audio.types';

export const USAGE =
  'Usage: export-text <textId> [--force] [--generate-missing] [--format mp3|wav|aac] [--padding sec] [--out path] [--status]';

export interface ExportArgs {
  textId: string;
  overrides: Partial<MixConfiguration>;
  force: boolean;
  generateMissing: boolean;
  status: boolean;
  out?: string;
}

export type ParsedExportArgs = { ok: true; args: ExportArgs } | { ok: false; message: string };

const VALUE_OPTIONS = ['--format', '--padding', '--out'] as const;
type ValueOption = (typeof VALUE_OPTIONS)[number];
const FLAGS = ['--force', '--generate-missing', '--status'] as const;

const isValueOption = (arg: string): arg is ValueOption => VALUE_OPTIONS.some((name) => name === arg);
const isFlag = (arg: string): boolean => FLAGS.some((name) => name === arg);

const isOutputFormat = (value: string): value is OutputFormat =>
  OUTPUT_FORMATS.some((format) => format === value);

/**
 * Parse the export-text command line. Option values are consumed with their
 * option, so `--out ./file.mp3 text-1` still finds `text-1`.
 */
export function parseExportArgs(argv: string[]): ParsedExportArgs {
  const values: Partial<Record<ValueOption, string>> = {};
  const flags = new Set<string>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (isValueOption(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        return { ok: false, message: `${arg} needs a value` };
      }
      values[arg] = value;
      i++;
    } else if (isFlag(arg)) {
      flags.add(arg);
    } else if (arg.startsWith('--')) {
      return { ok: false, message: `Unknown option "${arg}"` };
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    return { ok: false, message: USAGE };
  }

  const overrides: Partial<MixConfiguration> = {};
  const format = values['--format'];
  if (format !== undefined) {
    if (!isOutputFormat(format)) {
      return { ok: false, message: `Unknown format "${format}", expected one of ${OUTPUT_FORMATS.join(', ')}` };
    }
    overrides.outputFormat = format;
  }
  const padding = values['--padding'];
  if (padding !== undefined) {
    const value = Number(padding);
    if (!Number.isFinite(value) || value < 0) {
      return { ok: false, message: `Invalid --padding "${padding}"` };
    }
    overrides.segmentPaddingSec = value;
  }

  return {
    ok: true,
    args: {
      textId: positional[0],
      overrides,
      force: flags.has('--force'),
      generateMissing: flags.has('--generate-missing'),
      status: flags.has('--status'),
      out: values['--out'],
    },
  };
}
