import { promises as fs } from 'fs';
import path from 'path';
import { format } from 'date-fns';
import { DigestEntry, DigestSummary } from '@pingwatch/shared';
import { SinkError } from '../utils/errors';
import { formatClock, formatMinutes } from './event-log';

const describeEntries = (label: string, entries: DigestEntry[]): string[] =>
  entries.map((entry, index) =>
    `\t${label} ${index + 1} ended at ${formatClock(entry.endedAt)} and lasted ${formatMinutes(entry.durationMs)} minutes`
  );

export function renderDigest(summary: DigestSummary): string[] {
  return [
    `Outage digest for ${summary.date}`,
    `Number of outages: ${summary.outageCount}`,
    ...describeEntries('Outage', summary.outageDetails),
    `Latency digest for ${summary.date}`,
    `Number of periods of high latency: ${summary.anomalyCount}`,
    ...describeEntries('High latency period', summary.anomalyDetails),
  ];
}

export function digestFileName(summary: DigestSummary): string {
  return `pingwatch.digest.${format(summary.periodStart, 'yyyyMMdd')}.log`;
}

/**
 * Writes one dated digest file per period into `directory`.
 */
export class DigestWriter {
  constructor(private readonly directory: string) {}

  async write(summary: DigestSummary): Promise<string> {
    const filePath = path.join(this.directory, digestFileName(summary));

    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.appendFile(filePath, `${renderDigest(summary).join('\n')}\n`, 'utf8');
    } catch (error) {
      throw new SinkError(`Cannot write digest ${filePath}`, 'digest', error);
    }

    return filePath;
  }
}
