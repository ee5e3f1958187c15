export type AccountStatus = 'active' | 'disabled';

export interface Account {
  username: string;
  password: string;
  proxy?: string;
  status: AccountStatus;
  addedAt: string;
  lastUsed?: string;
  totalActions: number;
  /** Percentage (0-100) of successful actions in the most recent run */
  successRate: number;
}

export interface CreateAccountParams {
  username: string;
  password: string;
  proxy?: string;
}
