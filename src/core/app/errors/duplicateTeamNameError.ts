export class DuplicateTeamNameError extends Error {
  constructor(public readonly teamName: string) {
    super(`Team with name '${teamName}' already exists.`);
    this.name = 'DuplicateTeamNameError';
  }
}
