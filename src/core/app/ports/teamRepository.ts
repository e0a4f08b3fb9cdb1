import type { CreateTeamInput, Team } from '@core/domain';

export interface TeamRepository {
  getById(id: number): Promise<Team | null>;
  findByName(name: string): Promise<Team | null>;
  list(): Promise<Team[]>;
  create(input: CreateTeamInput): Promise<Team>;
  /** Applies a signed delta; the caller owns the sign and amount. */
  adjustBudget(teamId: number, delta: number): Promise<void>;
}
