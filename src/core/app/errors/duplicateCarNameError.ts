export class DuplicateCarNameError extends Error {
  constructor(public readonly carName: string) {
    super(`Car with name '${carName}' already exists.`);
    this.name = 'DuplicateCarNameError';
  }
}
