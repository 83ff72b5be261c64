export type TaskFilter = "all" | "open" | "done";

export type Task = Readonly<{
  id: number;
  title: string;
  done: boolean;
}>;

export type BoardState = Readonly<{
  tasks: readonly Task[];
  nextId: number;
  filter: TaskFilter;
}>;
