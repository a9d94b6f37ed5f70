import { UnsupportedFormatError } from '../lib/errors';

export const OUTPUT_FORMATS = ['html', 'text'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const DEFAULT_FORMAT: OutputFormat = 'html';

export const FORMAT_EXT: Record<OutputFormat, string> = {
  html: '.html',
  text: '.txt',
};

export function isOutputFormat(v: string): v is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === v);
}

export function parseFormat(raw: string | null | undefined): OutputFormat {
  const v = String(raw ?? '').trim().toLowerCase();
  if (!v) return DEFAULT_FORMAT;
  if (!isOutputFormat(v)) throw new UnsupportedFormatError(String(raw));
  return v;
}
