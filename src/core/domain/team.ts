export type Team = {
  id: number;
  name: string;
  budget: number;
};

export type CreateTeamInput = {
  name: string;
  budget: number;
};
