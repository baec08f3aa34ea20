import { Command } from 'commander';
import chalk from 'chalk';
import {
  FormationEngine,
  formationOffsets,
  type FormationType,
} from '@swarmkit/formation';
import { parseCount, parseFormationType, parseNumber } from '../options.js';
import { errorMessage, renderTable } from '../output.js';

export interface FormationPreviewOptions {
  count: number;
  /** [m] */
  spacing: number;
  /** [m] */
  radius: number;
  /** [deg] Wedge half-angle */
  angle: number;
  json?: boolean;
}

/**
 * Leader-frame offsets of every slot, formatted to centimeters
 */
export function formationRows(type: FormationType, options: FormationPreviewOptions): string[][] {
  const engine = new FormationEngine({
    type,
    spacing: options.spacing,
    formationRadius: options.radius,
    formationAngle: (options.angle * Math.PI) / 180,
  });

  return formationOffsets(engine.getGeometry(), options.count).map((offset, slot) => [
    String(slot),
    offset.x.toFixed(2),
    offset.y.toFixed(2),
    offset.z.toFixed(2),
  ]);
}

function preview(type: FormationType, options: FormationPreviewOptions): void {
  if (type === 'custom') {
    console.error(chalk.red('Custom formations are defined by explicit offsets and have nothing to preview'));
    process.exit(1);
  }

  try {
    const rows = formationRows(type, options);

    if (options.json) {
      const slots = rows.map(([slot, x, y, z]) => ({
        slot: Number(slot),
        x: Number(x),
        y: Number(y),
        z: Number(z),
      }));
      console.log(JSON.stringify({ type, count: options.count, slots }, null, 2));
      return;
    }

    console.log('\n' + chalk.bold(`${type} formation, ${options.count} vehicles`));
    console.log(renderTable(['Slot', 'X [m]', 'Y [m]', 'Z [m]'], rows));
  } catch (error) {
    console.error(chalk.red(errorMessage(error)));
    process.exit(1);
  }
}

export function formationCommand(program: Command): void {
  program
    .command('formation')
    .description('Preview the slot offsets of a formation in the leader frame')
    .argument('<type>', 'Formation type', parseFormationType)
    .option('-n, --count <count>', 'Number of vehicles', parseCount, 4)
    .option('-s, --spacing <meters>', 'Distance between slots', parseNumber, 5)
    .option('-r, --radius <meters>', 'Radius of circular formations', parseNumber, 10)
    .option('-a, --angle <degrees>', 'Wedge half-angle', parseNumber, 30)
    .option('-j, --json', 'Output as JSON')
    .action(preview);
}
