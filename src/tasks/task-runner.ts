import { ITask } from '../types/task.types';

export interface TaskRunRecord {
  startedAt: string;
  finishedAt: string;
  success: boolean;
  error?: string;
}

export class TaskRunner {
  private tasks: Map<string, ITask> = new Map();
  private lastRuns: Map<string, TaskRunRecord> = new Map();

  registerTask(task: ITask): void {
    this.tasks.set(task.name, task);
    console.log(`Task registered: ${task.name}`);
  }

  async executeTask(taskName: string): Promise<void> {
    const task = this.tasks.get(taskName);

    if (!task) {
      throw new Error(`Task not found: ${taskName}`);
    }

    const startedAt = new Date().toISOString();
    try {
      await task.execute();
      this.lastRuns.set(taskName, { startedAt, finishedAt: new Date().toISOString(), success: true });
    } catch (error) {
      this.lastRuns.set(taskName, {
        startedAt,
        finishedAt: new Date().toISOString(),
        success: false,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  async executeAllTasks(): Promise<void> {
    for (const name of this.tasks.keys()) {
      console.log(`Executing task: ${name}`);
      try {
        await this.executeTask(name);
      } catch (error) {
        console.error(`Task ${name} failed:`, error);
      }
    }
  }

  getRegisteredTasks(): string[] {
    return Array.from(this.tasks.keys());
  }

  getLastRun(taskName: string): TaskRunRecord | undefined {
    return this.lastRuns.get(taskName);
  }
}
