import chalk from 'chalk';
import { table } from 'table';
import type { Vector3 } from '@swarmkit/formation';

const TABLE_BORDER = {
  topBody: '─',
  topJoin: '┬',
  topLeft: '┌',
  topRight: '┐',
  bottomBody: '─',
  bottomJoin: '┴',
  bottomLeft: '└',
  bottomRight: '┘',
  bodyLeft: '│',
  bodyRight: '│',
  bodyJoin: '│',
  joinBody: '─',
  joinLeft: '├',
  joinRight: '┤',
  joinJoin: '┼',
};

export function renderTable(header: string[], rows: string[][]): string {
  return table([header.map(cell => chalk.bold(cell)), ...rows], { border: TABLE_BORDER });
}

export function formatVector(v: Vector3): string {
  return `(${v.x.toFixed(2)}, ${v.y.toFixed(2)}, ${v.z.toFixed(2)})`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
