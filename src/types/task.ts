export type TaskStatus = 'pending' | 'done';

export interface Task {
  title: string;
  status: TaskStatus;
}

export interface StoredTask extends Task {
  readonly id: string;
}
