import { z } from 'zod';

import type { CarRepository, Logger, TeamRepository } from '@core/app';
import { DuplicateCarNameError, describeIssues, normaliseZodIssues, type InputIssue } from '@core/app';
import type { Car, CarWithTeam } from '@core/domain';

export type RegisterCarInput = {
  name: string;
  speed: number;
  pitStopInterval: number;
  pitStopDuration: number;
  teamName: string;
};

export type RegisterCarResult =
  | { ok: false; reason: 'invalid-input'; message: string; issues: InputIssue[] }
  | { ok: false; reason: 'team-not-found'; message: string }
  | { ok: false; reason: 'name-taken'; message: string }
  | { ok: true; car: Car; message: string };

const positiveNumber = (label: string) =>
  z
    .number({ invalid_type_error: `${label} must be a number.` })
    .finite(`${label} must be a finite number.`)
    .positive(`${label} must be greater than zero.`);

const registerCarSchema = z.object({
  name: z.string().trim().min(1, 'Car name is required.'),
  speed: positiveNumber('Speed'),
  pitStopInterval: positiveNumber('Pit stop interval'),
  pitStopDuration: z
    .number({ invalid_type_error: 'Pit stop duration must be a number.' })
    .finite('Pit stop duration must be a finite number.')
    .nonnegative('Pit stop duration cannot be negative.'),
  teamName: z.string().trim().min(1, 'Team name is required.'),
});

type CarServiceDependencies = {
  carRepository: CarRepository;
  teamRepository: TeamRepository;
  logger: Logger;
};

export class CarService {
  private readonly carRepository: CarRepository;

  private readonly teamRepository: TeamRepository;

  private readonly logger: Logger;

  constructor(dependencies: CarServiceDependencies) {
    this.carRepository = dependencies.carRepository;
    this.teamRepository = dependencies.teamRepository;
    this.logger = dependencies.logger;
  }

  async registerCar(input: RegisterCarInput): Promise<RegisterCarResult> {
    const parsed = registerCarSchema.safeParse(input);
    if (!parsed.success) {
      const issues = normaliseZodIssues(parsed.error.issues);
      this.logger.warn('Car registration rejected due to invalid input.', {
        event: 'roster.car.invalid_input',
        outcome: 'rejected',
        issues,
      });
      return { ok: false, reason: 'invalid-input', message: describeIssues(issues), issues };
    }

    const { name, speed, pitStopInterval, pitStopDuration, teamName } = parsed.data;

    const team = await this.teamRepository.findByName(teamName);
    if (!team) {
      this.logger.info('Car registration rejected: team not found.', {
        event: 'roster.car.team_not_found',
        outcome: 'rejected',
      });
      return {
        ok: false,
        reason: 'team-not-found',
        message: `No team found with name '${teamName}'.`,
      };
    }

    if (await this.carRepository.findByName(name)) {
      return this.nameTaken(name);
    }

    let car: Car;
    try {
      car = await this.carRepository.create({
        name,
        speed,
        pitStopInterval,
        pitStopDuration,
        teamId: team.id,
      });
    } catch (error) {
      if (error instanceof DuplicateCarNameError) {
        return this.nameTaken(name);
      }

      throw error;
    }

    this.logger.info('Car registered.', {
      event: 'roster.car.created',
      outcome: 'success',
      carId: car.id,
      teamId: team.id,
    });

    return {
      ok: true,
      car,
      message: `Car '${car.name}' added successfully to team '${team.name}'.`,
    };
  }

  async listCars(): Promise<CarWithTeam[]> {
    return this.carRepository.list();
  }

  private nameTaken(name: string): RegisterCarResult {
    this.logger.info('Car registration rejected: name already in use.', {
      event: 'roster.car.name_taken',
      outcome: 'conflict',
    });
    return { ok: false, reason: 'name-taken', message: new DuplicateCarNameError(name).message };
  }
}
