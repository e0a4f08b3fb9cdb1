/**
 * Purpose: Run one race as a single all-or-nothing unit: event creation,
 * eligibility, fee collection, timing, ranking, prize distribution and
 * persistence.
 */

import { z } from 'zod';

import type { Logger, RacePersistencePorts, RaceUnitOfWork } from '@core/app';
import {
  NoEligibleParticipantsError,
  StorageError,
  describeIssues,
  normaliseZodIssues,
  type InputIssue,
} from '@core/app';
import type { EligibleCar, RaceEntry, RaceEvent, RaceResult } from '@core/domain';
import { DEFAULT_PRIZE_SPLIT, computePrizeMoney, sumFees, type PodiumTieMode } from '../../../race/prizes';
import { rankByMin } from '../../../race/ranking';
import { computeTimeTaken } from '../../../race/timing';

export const RACE_STAGES = [
  'started',
  'event-created',
  'eligibility-checked',
  'fees-collected',
  'entries-computed',
  'ranked',
  'prizes-computed',
  'persisted',
  'committed',
  'rolled-back',
] as const;

export type RaceStage = (typeof RACE_STAGES)[number];

/**
 * `rollback`: a failed fee or prize adjustment aborts the race and discards
 * every write. `log-and-continue`: the failure is logged, recorded in the
 * outcome and skipped, which leaves the ledger partially applied.
 */
export type AdjustmentFailurePolicy = 'rollback' | 'log-and-continue';

/**
 * `per-entry` records the fee on every entry, so a team with two cars puts two
 * fees into the pot while paying one. `per-team` records it once per team that
 * actually paid.
 */
export type PotMode = 'per-entry' | 'per-team';

export type RaceEngineOptions = {
  adjustmentFailurePolicy: AdjustmentFailurePolicy;
  potMode: PotMode;
  podiumTieMode: PodiumTieMode;
  prizeSplit: readonly number[];
};

export const DEFAULT_RACE_ENGINE_OPTIONS: RaceEngineOptions = {
  adjustmentFailurePolicy: 'rollback',
  potMode: 'per-entry',
  podiumTieMode: 'full-share',
  prizeSplit: DEFAULT_PRIZE_SPLIT,
};

export type RunRaceInput = {
  distance: number;
  fee: number;
};

export type SkippedBudgetAdjustment = {
  kind: 'fee' | 'prize';
  teamId: number;
  delta: number;
  message: string;
};

export type RaceOutcome = {
  event: RaceEvent;
  entries: RaceEntry[];
  results: RaceResult[];
  pot: number;
  chargedTeamIds: number[];
  feesCollected: number;
  prizesPaid: number;
  skippedAdjustments: SkippedBudgetAdjustment[];
};

export type RunRaceResult =
  | { ok: true; raceId: number; outcome: RaceOutcome }
  | {
      ok: false;
      reason: 'invalid-input';
      message: string;
      issues: InputIssue[];
      failedAfter: RaceStage;
    }
  | { ok: false; reason: 'no-eligible-participants'; message: string; failedAfter: RaceStage }
  | {
      ok: false;
      reason: 'storage-error';
      message: string;
      error: StorageError;
      failedAfter: RaceStage;
    };

const runRaceInputSchema = z.object({
  distance: z
    .number({ invalid_type_error: 'Distance must be a number.' })
    .finite('Distance must be a finite number.')
    .positive('Distance must be greater than zero.'),
  fee: z
    .number({ invalid_type_error: 'Entry fee must be a number.' })
    .finite('Entry fee must be a finite number.')
    .nonnegative('Entry fee cannot be negative.'),
});

type RaceEngineDependencies = {
  unitOfWork: RaceUnitOfWork;
  logger: Logger;
  options?: Partial<RaceEngineOptions>;
  clock?: () => Date;
};

export class RaceEngine {
  private readonly unitOfWork: RaceUnitOfWork;

  private readonly logger: Logger;

  private readonly options: RaceEngineOptions;

  private readonly clock: () => Date;

  constructor(dependencies: RaceEngineDependencies) {
    this.unitOfWork = dependencies.unitOfWork;
    this.logger = dependencies.logger;
    this.options = { ...DEFAULT_RACE_ENGINE_OPTIONS, ...dependencies.options };
    this.clock = dependencies.clock ?? (() => new Date());
  }

  get configuration(): Readonly<RaceEngineOptions> {
    return this.options;
  }

  async runRace(input: RunRaceInput): Promise<RunRaceResult> {
    const startedAt = this.clock();
    const elapsed = () => this.clock().getTime() - startedAt.getTime();
    const logger = this.logger.withContext({ route: 'race.run' });

    const parsed = runRaceInputSchema.safeParse(input);
    if (!parsed.success) {
      const issues = normaliseZodIssues(parsed.error.issues);
      logger.warn('Race rejected due to invalid input.', {
        event: 'race.run.invalid_input',
        outcome: 'rejected',
        issues,
        durationMs: elapsed(),
      });
      return {
        ok: false,
        reason: 'invalid-input',
        message: describeIssues(issues),
        issues,
        failedAfter: 'started',
      };
    }

    const { distance, fee } = parsed.data;
    let stage: RaceStage = 'started';
    const advance = (next: RaceStage) => {
      stage = next;
      logger.debug('Race stage reached.', { event: 'race.run.stage', stage: next });
    };

    try {
      const outcome = await this.unitOfWork.run((ports) =>
        this.execute(ports, { distance, fee }, advance, logger),
      );
      advance('committed');

      logger.info('Race completed successfully.', {
        event: 'race.run.completed',
        outcome: 'success',
        raceId: outcome.event.id,
        distance,
        fee,
        entrants: outcome.entries.length,
        pot: outcome.pot,
        feesCollected: outcome.feesCollected,
        prizesPaid: outcome.prizesPaid,
        skippedAdjustments: outcome.skippedAdjustments.length,
        durationMs: elapsed(),
      });

      return { ok: true, raceId: outcome.event.id, outcome };
    } catch (error) {
      const failedAfter: RaceStage = stage;
      advance('rolled-back');

      if (error instanceof NoEligibleParticipantsError) {
        logger.info('Race aborted: no team can afford the entry fee.', {
          event: 'race.run.no_eligible_participants',
          outcome: 'rolled-back',
          distance,
          fee,
          failedAfter,
          durationMs: elapsed(),
        });
        return {
          ok: false,
          reason: 'no-eligible-participants',
          message: error.message,
          failedAfter,
        };
      }

      if (error instanceof StorageError) {
        logger.error('Race aborted and rolled back after a storage failure.', {
          event: 'race.run.storage_error',
          outcome: 'rolled-back',
          operation: error.operation,
          failedAfter,
          error,
          durationMs: elapsed(),
        });
        return {
          ok: false,
          reason: 'storage-error',
          message: `Race aborted, rolled back. Reason: ${error.message}`,
          error,
          failedAfter,
        };
      }

      logger.error('Race aborted and rolled back after an unexpected failure.', {
        event: 'race.run.failed',
        outcome: 'rolled-back',
        failedAfter,
        error,
        durationMs: elapsed(),
      });
      throw error;
    }
  }

  private async execute(
    ports: RacePersistencePorts,
    { distance, fee }: RunRaceInput,
    advance: (stage: RaceStage) => void,
    logger: Logger,
  ): Promise<RaceOutcome> {
    const event = await ports.raceEvents.create({ distance, startedAt: this.clock() });
    advance('event-created');

    const roster = await ports.cars.listEligible(fee);
    if (roster.length === 0) {
      throw new NoEligibleParticipantsError(fee);
    }
    advance('eligibility-checked');

    const skippedAdjustments: SkippedBudgetAdjustment[] = [];
    const adjust = async (kind: SkippedBudgetAdjustment['kind'], teamId: number, delta: number) => {
      try {
        await ports.teams.adjustBudget(teamId, delta);
        return true;
      } catch (error) {
        if (this.options.adjustmentFailurePolicy === 'rollback') {
          throw error;
        }

        const message = error instanceof Error ? error.message : String(error);
        logger.warn('Budget adjustment failed; continuing without it.', {
          event: 'race.run.adjustment_skipped',
          outcome: 'skipped',
          raceId: event.id,
          kind,
          teamId,
          delta,
          error,
        });
        skippedAdjustments.push({ kind, teamId, delta, message });
        return false;
      }
    };

    // One fee per team, however many of its cars are racing.
    const chargedTeamIds: number[] = [];
    for (const teamId of distinctTeamIds(roster)) {
      if (await adjust('fee', teamId, -fee)) {
        chargedTeamIds.push(teamId);
      }
    }
    advance('fees-collected');

    const entries = this.buildEntries(event, roster, fee, new Set(chargedTeamIds));
    advance('entries-computed');
    await ports.raceEntries.bulkInsert(entries);

    const ranked = rankByMin(entries, (entry) => entry.timeTaken);
    advance('ranked');

    const pot = sumFees(entries.map((entry) => entry.feePaid));
    const prizes = computePrizeMoney(
      ranked.map(({ position }) => position),
      pot,
      { split: this.options.prizeSplit, tieMode: this.options.podiumTieMode },
    );
    const results: RaceResult[] = ranked.map(({ item, position }, index) => ({
      raceId: event.id,
      teamId: item.teamId,
      carId: item.carId,
      position,
      prizeMoney: prizes[index] ?? 0,
    }));
    advance('prizes-computed');

    await ports.raceResults.bulkInsert(results);

    let prizesPaid = 0;
    for (const result of results) {
      if (result.prizeMoney > 0 && (await adjust('prize', result.teamId, result.prizeMoney))) {
        prizesPaid += result.prizeMoney;
      }
    }
    advance('persisted');

    return {
      event,
      entries,
      results,
      pot,
      chargedTeamIds,
      feesCollected: fee * chargedTeamIds.length,
      prizesPaid,
      skippedAdjustments,
    };
  }

  private buildEntries(
    event: RaceEvent,
    roster: EligibleCar[],
    fee: number,
    chargedTeamIds: ReadonlySet<number>,
  ): RaceEntry[] {
    const feeRecorded = new Set<number>();

    return roster.map((car) => {
      let feePaid = fee;
      if (this.options.potMode === 'per-team') {
        feePaid = chargedTeamIds.has(car.teamId) && !feeRecorded.has(car.teamId) ? fee : 0;
        feeRecorded.add(car.teamId);
      }

      return {
        raceId: event.id,
        teamId: car.teamId,
        carId: car.carId,
        timeTaken: computeTimeTaken(event.distance, car),
        feePaid,
      };
    });
  }
}

const distinctTeamIds = (roster: EligibleCar[]): number[] =>
  Array.from(new Set(roster.map((car) => car.teamId)));
