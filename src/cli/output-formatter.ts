/**
 * Terminal rendering of CliResult (chalk). Values stay unstyled so they can be piped.
 */

import chalk from 'chalk';
import type { CliOutput, CliResult } from './types/cli-result.js';

export interface OutputSink {
  out(text: string): void;
  err(text: string): void;
}

export const CONSOLE_SINK: OutputSink = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

function section(title: string | null, items: readonly string[] | undefined, style: (s: string) => string): string[] {
  if (!items || items.length === 0) return [];
  return ['', ...(title ? [style(title)] : []), ...items.map((item) => style(`  • ${item}`))];
}

export function formatOutput(output: CliOutput, isError = false): string {
  const headline = isError ? chalk.red(`❌ ${output.message}`) : chalk.green(`✅ ${output.message}`);
  const values = output.values && output.values.length > 0 ? ['', ...output.values] : [];

  return [
    headline,
    ...values,
    ...section(null, output.details, chalk.white),
    ...section('⚠️  Warnings:', output.warnings, chalk.yellow),
    ...section('💡 Suggestions:', output.suggestions, chalk.gray),
  ].join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output) : '';
    case 'failure':
      return formatOutput(result.output, true);
  }
}

/** Successes go to `out`, failures to `err`; a bare success prints nothing. */
export function printResult(result: CliResult, sink: OutputSink = CONSOLE_SINK): void {
  const text = formatResult(result);
  if (!text) return;
  if (result.kind === 'failure') sink.err(text);
  else sink.out(text);
}
