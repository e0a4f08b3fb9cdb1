/**
 * Summary: Command line surface for managing teams and cars and running races.
 */

import { resolve } from 'node:path';
import type { Writable } from 'node:stream';
import { fileURLToPath } from 'node:url';

import dotenv from 'dotenv';
import minimist, { type ParsedArgs } from 'minimist';

import type { RaceSummary } from '../src/core/app';
import { getApplicationLogger } from '../src/dependencies/logger';
import { createRallyContainer, type RallyContainer } from '../src/dependencies/rally';
import { ensureError } from '../src/lib/errors/ensureError';
import { getEnvironment } from '../src/server/config/environment';

type RallyServices = Pick<
  RallyContainer,
  'teamService' | 'carService' | 'raceEngine' | 'raceSummaryService' | 'ensureSchema'
>;

export type RunRallyCliOptions = {
  services: RallyServices;
  output?: Writable;
};

export type RallyCliResult = {
  exitCode: number;
};

export const USAGE = [
  'Usage: rally <command> [options]',
  '',
  '  setup',
  '  team add --name <name> --budget <amount>',
  '  team list',
  '  car add --name <name> --speed <speed> --pit-interval <distance> --pit-duration <seconds> --team <team>',
  '  car list',
  '  race run --distance <distance> --fee <amount>',
  '  race show --id <race id>',
  '  race list',
].join('\n');

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const readString = (argv: ParsedArgs, key: string): string => {
  const value: unknown = argv[key];
  if (typeof value === 'string' && value.trim().length > 0) {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }

  throw new UsageError(`Missing required option --${key}.`);
};

const readNumber = (argv: ParsedArgs, key: string): number => {
  const value: unknown = argv[key];
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    return Number(value);
  }

  throw new UsageError(`Missing required option --${key}.`);
};

export const formatTable = (headers: string[], rows: string[][]): string => {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length)),
  );
  const formatRow = (cells: string[]) =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? cell.length))
      .join('  ')
      .trimEnd();

  return [formatRow(headers), ...rows.map(formatRow)].join('\n');
};

export const formatMoney = (amount: number): string => amount.toFixed(2);

export const formatRaceSummary = (summary: RaceSummary): string => {
  const lines = [
    `Race ${summary.event.id}: distance ${summary.event.distance}, started ${summary.event.startedAt.toISOString()}`,
  ];

  if (summary.podium.length > 0) {
    lines.push('', 'Podium');
    for (const place of summary.podium) {
      lines.push(
        `${place.medal} ${place.teamName} (${place.carName}) - ${place.timeTakenMinutes.toFixed(2)} min`,
      );
    }
  }

  lines.push(
    '',
    formatTable(
      ['Pos', 'Team - Car', 'Time (min)', 'Prize'],
      summary.standings.map((row) => [
        String(row.position),
        row.label,
        row.timeTakenMinutes.toFixed(2),
        formatMoney(row.prizeMoney),
      ]),
    ),
  );

  return lines.join('\n');
};

export async function runRallyCli(
  args: string[],
  options: RunRallyCliOptions,
): Promise<RallyCliResult> {
  const output = options.output ?? process.stdout;
  const { services } = options;
  const write = (text: string) => output.write(`${text}\n`);
  const argv = minimist(args, { string: ['name', 'team'] });
  const [command, action] = argv._;

  try {
    switch (`${command ?? ''} ${action ?? ''}`.trim()) {
      case 'setup': {
        const created = services.ensureSchema();
        write(created ? '✅ Rally schema created.' : '✅ Rally schema already in place.');
        return { exitCode: 0 };
      }

      case 'team add': {
        const result = await services.teamService.registerTeam({
          name: readString(argv, 'name'),
          budget: readNumber(argv, 'budget'),
        });
        write(result.ok ? `✅ ${result.message}` : `🚫 ${result.message}`);
        return { exitCode: result.ok ? 0 : 1 };
      }

      case 'team list': {
        const teams = await services.teamService.listTeams();
        write(
          formatTable(
            ['Id', 'Team', 'Budget'],
            teams.map((team) => [String(team.id), team.name, formatMoney(team.budget)]),
          ),
        );
        return { exitCode: 0 };
      }

      case 'car add': {
        const result = await services.carService.registerCar({
          name: readString(argv, 'name'),
          speed: readNumber(argv, 'speed'),
          pitStopInterval: readNumber(argv, 'pit-interval'),
          pitStopDuration: readNumber(argv, 'pit-duration'),
          teamName: readString(argv, 'team'),
        });
        write(result.ok ? `✅ ${result.message}` : `🚫 ${result.message}`);
        return { exitCode: result.ok ? 0 : 1 };
      }

      case 'car list': {
        const cars = await services.carService.listCars();
        write(
          formatTable(
            ['Id', 'Car', 'Speed', 'Pit interval', 'Pit duration', 'Team'],
            cars.map((car) => [
              String(car.id),
              car.name,
              String(car.speed),
              String(car.pitStopInterval),
              String(car.pitStopDuration),
              car.teamName,
            ]),
          ),
        );
        return { exitCode: 0 };
      }

      case 'race run': {
        const result = await services.raceEngine.runRace({
          distance: readNumber(argv, 'distance'),
          fee: readNumber(argv, 'fee'),
        });

        if (!result.ok) {
          write(result.reason === 'storage-error' ? `🚨 ${result.message}` : `🚫 ${result.message}`);
          return { exitCode: 1 };
        }

        write(`✅ Race ${result.raceId} completed successfully.`);
        const summary = await services.raceSummaryService.getSummary(result.raceId);
        if (summary) {
          write(formatRaceSummary(summary));
        }
        return { exitCode: 0 };
      }

      case 'race show': {
        const raceId = readNumber(argv, 'id');
        const summary = Number.isInteger(raceId)
          ? await services.raceSummaryService.getSummary(raceId)
          : null;

        if (!summary) {
          write(`🚫 No race found with id ${String(raceId)}.`);
          return { exitCode: 1 };
        }

        write(formatRaceSummary(summary));
        return { exitCode: 0 };
      }

      case 'race list': {
        const races = await services.raceSummaryService.listRaces();
        write(
          formatTable(
            ['Race', 'Distance', 'Started'],
            races.map((race) => [
              String(race.id),
              String(race.distance),
              race.startedAt.toISOString(),
            ]),
          ),
        );
        return { exitCode: 0 };
      }

      default:
        write(USAGE);
        return { exitCode: command ? 1 : 0 };
    }
  } catch (error) {
    if (error instanceof UsageError) {
      write(`🚫 ${error.message}`);
      write(USAGE);
      return { exitCode: 1 };
    }

    throw error;
  }
}

function isCliEntry() {
  const current = fileURLToPath(import.meta.url);
  const calledWith = process.argv[1];
  if (!calledWith) {
    return false;
  }
  return current === resolve(calledWith);
}

async function main() {
  dotenv.config();

  const logger = getApplicationLogger().withContext({ route: 'cli' });
  const container = createRallyContainer(getEnvironment(), logger);

  try {
    container.ensureSchema();
    const result = await runRallyCli(process.argv.slice(2), { services: container });
    process.exitCode = result.exitCode;
  } catch (error) {
    logger.error('Rally command failed.', {
      event: 'cli.failed',
      outcome: 'failure',
      error,
    });
    process.stderr.write(`🚨 ${ensureError(error).message}\n`);
    process.exitCode = 1;
  } finally {
    container.close();
  }
}

if (isCliEntry()) {
  void main();
}
