import { z } from 'zod';

import type { Logger, TeamRepository } from '@core/app';
import { DuplicateTeamNameError, describeIssues, normaliseZodIssues, type InputIssue } from '@core/app';
import type { Team } from '@core/domain';

export type RegisterTeamInput = {
  name: string;
  budget: number;
};

export type RegisterTeamResult =
  | { ok: false; reason: 'invalid-input'; message: string; issues: InputIssue[] }
  | { ok: false; reason: 'name-taken'; message: string }
  | { ok: true; team: Team; message: string };

const registerTeamSchema = z.object({
  name: z.string().trim().min(1, 'Team name is required.'),
  budget: z
    .number({ invalid_type_error: 'Budget must be a number.' })
    .finite('Budget must be a finite number.'),
});

export class TeamService {
  constructor(
    private readonly teamRepository: TeamRepository,
    private readonly logger: Logger,
  ) {}

  async registerTeam(input: RegisterTeamInput): Promise<RegisterTeamResult> {
    const parsed = registerTeamSchema.safeParse(input);
    if (!parsed.success) {
      const issues = normaliseZodIssues(parsed.error.issues);
      this.logger.warn('Team registration rejected due to invalid input.', {
        event: 'roster.team.invalid_input',
        outcome: 'rejected',
        issues,
      });
      return { ok: false, reason: 'invalid-input', message: describeIssues(issues), issues };
    }

    const { name, budget } = parsed.data;
    const existing = await this.teamRepository.findByName(name);
    if (existing) {
      return this.nameTaken(name);
    }

    let team: Team;
    try {
      team = await this.teamRepository.create({ name, budget });
    } catch (error) {
      if (error instanceof DuplicateTeamNameError) {
        return this.nameTaken(name);
      }

      throw error;
    }

    this.logger.info('Team registered.', {
      event: 'roster.team.created',
      outcome: 'success',
      teamId: team.id,
      budget: team.budget,
    });

    return {
      ok: true,
      team,
      message: `Team '${team.name}' created successfully with budget ${team.budget}.`,
    };
  }

  async listTeams(): Promise<Team[]> {
    return this.teamRepository.list();
  }

  private nameTaken(name: string): RegisterTeamResult {
    this.logger.info('Team registration rejected: name already in use.', {
      event: 'roster.team.name_taken',
      outcome: 'conflict',
    });
    return { ok: false, reason: 'name-taken', message: new DuplicateTeamNameError(name).message };
  }
}
