export class NoEligibleParticipantsError extends Error {
  constructor(public readonly fee: number) {
    super(`No teams with enough budget to join this race (entry fee ${fee}).`);
    this.name = 'NoEligibleParticipantsError';
  }
}
