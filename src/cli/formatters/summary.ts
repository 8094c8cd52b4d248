/**
 * Human-readable run summary.
 */
import chalk from 'chalk';
import type { RunReport, UnitStatus } from '../../core/execution/types.js';

const SECTIONS: Array<{ status: UnitStatus; label: string; color: (text: string) => string }> = [
  { status: 'succeeded', label: 'succeeded', color: chalk.green },
  { status: 'failed', label: 'failed', color: chalk.red },
  { status: 'skipped', label: 'skipped', color: chalk.yellow },
  { status: 'cancelled', label: 'cancelled', color: chalk.yellow },
  { status: 'not-selected', label: 'not selected', color: chalk.dim },
];

export function formatRunSummary(report: RunReport): string {
  const lines: string[] = [];
  lines.push(chalk.bold(`Summary: ${report.action}`));

  for (const section of SECTIONS) {
    const units = report.units.filter((u) => u.status === section.status);
    if (units.length === 0) continue;
    lines.push(`  ${section.color(`${section.label} (${units.length})`)}: ${units.map((u) => u.unit).join(', ')}`);
    if (section.status === 'failed' || section.status === 'skipped') {
      for (const unit of units) {
        if (unit.error) {
          lines.push(`    ${unit.unit}: ${unit.error}`);
        }
      }
    }
  }

  for (const warning of report.warnings) {
    lines.push(chalk.yellow(`  warning: ${warning}`));
  }

  if (report.cancelled) {
    lines.push(chalk.yellow('Result: CANCELLED'));
  } else {
    lines.push(report.ok ? chalk.green('Result: OK') : chalk.red('Result: FAILED'));
  }
  return lines.join('\n');
}
