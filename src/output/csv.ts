import fs from 'fs';
import path from 'path';
import { OutputRow } from '../domain/models';

export const CSV_HEADER = [
    'ZipCodeStart',
    'ZipCodeEnd',
    'WeightStart',
    'WeightEnd',
    'AbsoluteMoneyCost',
    'TimeCost',
] as const;

export function formatRow(row: OutputRow): string {
    return [
        row.zipStart,
        row.zipEnd,
        row.weightStart,
        row.weightEnd,
        row.moneyCost.toFixed(2),
        row.timeDays,
    ].join(',');
}

export function formatTable(rows: readonly OutputRow[]): string {
    const lines = [CSV_HEADER.join(','), ...rows.map(formatRow)];
    return lines.join('\n') + '\n';
}

export async function tableExists(outputPath: string): Promise<boolean> {
    try {
        return (await fs.promises.stat(outputPath)).isFile();
    } catch {
        return false;
    }
}

export async function writeTable(outputPath: string, rows: readonly OutputRow[]): Promise<void> {
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.promises.writeFile(outputPath, formatTable(rows), 'utf-8');
}
