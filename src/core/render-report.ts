// src/core/render-report.ts

import pluralize from 'pluralize';

import type { Finding, RenderedReport } from '../schema';
import { joinRelative } from '../util/fs-utils';

export interface RenderOptions {
   /**
    * Include the INFORMATION section. Default: true
    */
   showInformation?: boolean;
}

/**
 * "<dir>/<subject>: <message>", with the submission root shown as ".".
 */
export function formatEntry(entry: Finding): string {
   const where =
      entry.subject === undefined ? entry.path : joinRelative(entry.path, entry.subject);
   return `${where}: ${entry.message}`;
}

function section(title: string, entries: readonly Finding[]): string[] {
   if (entries.length === 0) return [];
   return [title, ...entries.map((entry) => `- ${formatEntry(entry)}`)];
}

/**
 * Render the headed FATAL / WARNING / INFORMATION sections.
 * Empty sections are left out entirely; a clean report renders as "".
 */
export function renderReport(report: RenderedReport, options: RenderOptions = {}): string {
   const showInformation = options.showInformation ?? true;

   const lines = [
      ...section('FATAL', report.fatal),
      ...section('WARNING', report.warnings),
      ...(showInformation ? section('INFORMATION', report.information) : []),
   ];

   return lines.join('\n');
}

/**
 * One-line tally, e.g. "1 fatal problem, 2 warnings, 0 notices".
 */
export function summarizeReport(report: RenderedReport): string {
   return [
      pluralize('fatal problem', report.fatal.length, true),
      pluralize('warning', report.warnings.length, true),
      pluralize('notice', report.information.length, true),
   ].join(', ');
}
