import type { ProgressMarker } from '../types';

const TRANSFER_LINE = /(\d+)\s+(\d+)\s+(\d+)\s+(\d+)\s+(.*)/;

const MARKERS: [string, 'archive_name' | 'fingerprint' | 'start_time' | 'end_time'][] = [
  ['Archive name:', 'archive_name'],
  ['Archive fingerprint:', 'fingerprint'],
  ['Time (start):', 'start_time'],
  ['Time (end):', 'end_time'],
];

export function parseProgressLine(line: string): ProgressMarker | null {
  const transfer = TRANSFER_LINE.exec(line);
  if (transfer) {
    return {
      type: 'progress',
      originalSize: parseInt(transfer[1], 10),
      compressedSize: parseInt(transfer[2], 10),
      deduplicatedSize: parseInt(transfer[3], 10),
      fileCount: parseInt(transfer[4], 10),
      path: transfer[5].trim(),
    };
  }

  for (const [prefix, type] of MARKERS) {
    if (line.includes(prefix)) {
      const value = line.slice(line.indexOf(prefix) + prefix.length).trim();
      return { type, value };
    }
  }

  return null;
}
