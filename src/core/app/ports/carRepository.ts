import type { Car, CarWithTeam, CreateCarInput, EligibleCar } from '@core/domain';

export interface CarRepository {
  findByName(name: string): Promise<Car | null>;
  list(): Promise<CarWithTeam[]>;
  create(input: CreateCarInput): Promise<Car>;
  /**
   * Cars whose team budget is at least `feeThreshold`, ordered by car id.
   * Budgets are read at the instant of the call.
   */
  listEligible(feeThreshold: number): Promise<EligibleCar[]>;
}
