import chalk from 'chalk';

import type { VerifyReport } from '../../core/types.js';
import { formatImageRef } from '../../runtime/types.js';
import { formatSeconds, padRight } from './format.js';
import { theme, LABEL_WIDTH } from './theme.js';

// ── Brand Identity ──────────────────────────────────────────────────────────

const LOGO = `  ${chalk.bold('dockcheck')}`;

export function brandLine(version: string): string {
  return `${LOGO} ${theme.dim(`v${version}`)} ${theme.dim('—')} ${theme.dim('container build & health verification')}`;
}

/**
 * Lines for the boxed run summary.
 */
export function summaryLines(report: VerifyReport, thresholdMb: number): string[] {
  const row = (label: string, value: string) => `${theme.dim(padRight(label, LABEL_WIDTH))}${value}`;
  const lines: string[] = [];

  lines.push(row('Build time', formatSeconds(report.build.durationSeconds)));
  lines.push(row('Image', formatImageRef(report.instance.image)));
  lines.push(row('Image size', `${report.artifact.sizeRaw} ${sizeBadge(report.artifact.sizeClass, thresholdMb)}`));
  if (report.image) lines.push(row('Created', report.image.createdAt));
  lines.push(row('Container', `${report.instance.name} ${theme.dim(`(${report.containerId.slice(0, 12)})`)}`));
  lines.push(row('URL', report.serviceUrl));
  lines.push(row('Docs', report.docsUrl));
  lines.push(row('Health', `status=${report.health.status ?? '?'} ${theme.dim(`(attempt ${report.health.attempt})`)}`));
  if (report.resources) {
    lines.push(row('CPU', report.resources.cpuPercent));
    lines.push(row('Memory', report.resources.memoryUsage));
  } else {
    lines.push(row('Resources', theme.warning('unavailable')));
  }
  return lines;
}

function sizeBadge(sizeClass: VerifyReport['artifact']['sizeClass'], thresholdMb: number): string {
  switch (sizeClass) {
    case 'under_threshold':
      return theme.success(`(< ${thresholdMb} MB)`);
    case 'over_threshold':
      return theme.warning(`(≥ ${thresholdMb} MB)`);
    case 'unknown':
      return theme.warning('(unrecognized size)');
  }
}
