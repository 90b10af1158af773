/** Integer identity, assigned once and never reused */
export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string;
  readonly completed: boolean;
}
