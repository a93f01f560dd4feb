import type { ArchivePlan, ScanReport } from './types.js';

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:mm`
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}`
  );
}

function ordinal(index: number): string {
  return String(index + 1).padStart(2);
}

export function formatScanReport(report: ScanReport): string[] {
  const lines = [
    `Root: ${report.root}`,
    `Scanned project folders: ${report.scannedCount}`,
    `Stale threshold: ${report.olderThanDays} days`,
    '',
  ];

  if (report.stale.length === 0) {
    lines.push('No stale folders found. ✅');
    return lines;
  }

  lines.push('Stale folders (oldest first):');
  report.stale.forEach((item, index) => {
    lines.push(`  ${ordinal(index)}. ${item.path}  (last modified: ${formatTimestamp(item.lastModified)})`);
  });
  return lines;
}

export function formatArchivePlan(plan: ArchivePlan): string[] {
  const lines = [
    `Archive destination: ${plan.destRoot}`,
    `Month bucket: ${plan.monthBucket}`,
    `Planned moves: ${plan.moves.length}`,
    '',
  ];

  plan.moves.forEach((move, index) => {
    lines.push(`  ${ordinal(index)}. '${move.from}' -> '${move.to}'`);
  });
  return lines;
}
