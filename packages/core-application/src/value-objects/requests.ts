export type MoveRequest = {
  destination: string;
  keepCategory: boolean;
};

export type InsertRequest = {
  profile: string;
  category: string;
  name: string;
  secret: string;
  secondary?: string;
};
