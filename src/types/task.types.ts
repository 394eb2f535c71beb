export interface ITask {
  name: string;
  execute(): Promise<void>;
}
