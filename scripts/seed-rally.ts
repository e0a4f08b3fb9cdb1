/**
 * Summary: Seeds a baseline roster of teams and cars; existing names are skipped.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import dotenv from 'dotenv';
import { z } from 'zod';

import { getApplicationLogger } from '../src/dependencies/logger';
import { createRallyContainer } from '../src/dependencies/rally';
import { ensureError } from '../src/lib/errors/ensureError';
import { getEnvironment } from '../src/server/config/environment';

const ROSTER_FILE = fileURLToPath(new URL('../data/seed-roster.json', import.meta.url));

const rosterSchema = z.object({
  teams: z.array(
    z.object({
      name: z.string(),
      budget: z.number(),
      cars: z.array(
        z.object({
          name: z.string(),
          speed: z.number(),
          pitStopInterval: z.number(),
          pitStopDuration: z.number(),
        }),
      ),
    }),
  ),
});

type SeedRoster = z.infer<typeof rosterSchema>;

const loadSeedRoster = (path: string = ROSTER_FILE): SeedRoster =>
  rosterSchema.parse(JSON.parse(readFileSync(path, 'utf8')));

async function main() {
  dotenv.config();

  const logger = getApplicationLogger().withContext({ route: 'scripts/seed-rally' });
  const container = createRallyContainer(getEnvironment(), logger);
  let created = 0;
  let skipped = 0;

  try {
    container.ensureSchema();

    for (const team of loadSeedRoster().teams) {
      const teamResult = await container.teamService.registerTeam({
        name: team.name,
        budget: team.budget,
      });
      if (teamResult.ok) {
        created += 1;
      } else {
        skipped += 1;
      }

      for (const car of team.cars) {
        const carResult = await container.carService.registerCar({ ...car, teamName: team.name });
        if (carResult.ok) {
          created += 1;
        } else {
          skipped += 1;
        }
      }
    }

    logger.info('Seed completed.', {
      event: 'seed.completed',
      outcome: 'success',
      created,
      skipped,
    });
  } catch (error) {
    logger.error('Seed failed.', { event: 'seed.failed', outcome: 'failure', error });
    process.stderr.write(`Seed failed: ${ensureError(error).message}\n`);
    process.exitCode = 1;
  } finally {
    container.close();
  }
}

void main();
