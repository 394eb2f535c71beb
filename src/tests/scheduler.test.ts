import { MemoryCacheStore } from '../repositories/memory-cache.repository';
import { ResolutionCache } from '../services/resolution-cache.service';
import { CachePurgeTask } from '../tasks/cache-purge.task';
import { TaskRunner } from '../tasks/task-runner';
import { Scheduler } from '../utils/scheduler.util';

describe('Scheduler', () => {
  let taskRunner: TaskRunner;
  let scheduler: Scheduler;

  beforeEach(() => {
    taskRunner = new TaskRunner();
    taskRunner.registerTask(new CachePurgeTask(new ResolutionCache(new MemoryCacheStore(), 60)));
    scheduler = new Scheduler(taskRunner);
  });

  afterEach(() => {
    scheduler.stopAll();
  });

  test('should reject an invalid cron expression', () => {
    expect(() => scheduler.scheduleCachePurge('every hour')).toThrow('Invalid cron expression: every hour');
    expect(scheduler.getScheduledTasks()).toEqual([]);
  });

  test('should schedule the cache purge once', () => {
    scheduler.scheduleCachePurge('0 * * * *');
    scheduler.scheduleCachePurge('*/5 * * * *');
    expect(scheduler.getScheduledTasks()).toEqual(['CachePurgeTask']);
  });

  test('should stop scheduled tasks', () => {
    scheduler.scheduleCachePurge('0 * * * *');
    scheduler.stopTask('CachePurgeTask');
    expect(scheduler.getScheduledTasks()).toEqual([]);
  });
});

describe('TaskRunner', () => {
  test('should reject an unknown task', async () => {
    await expect(new TaskRunner().executeTask('Missing')).rejects.toThrow('Task not found: Missing');
  });

  test('should run every task and record the purge', async () => {
    const runner = new TaskRunner();
    const store = new MemoryCacheStore(() => 0);
    const cache = new ResolutionCache(store, 60);
    cache.putResolution({ title: 'Heat' }, { strategy: null, candidates: [] });
    runner.registerTask(new CachePurgeTask(cache));

    await runner.executeAllTasks();

    expect(runner.getRegisteredTasks()).toEqual(['CachePurgeTask']);
    expect(runner.getLastRun('CachePurgeTask')?.success).toBe(true);
    expect(store.size()).toBe(1);
  });
});
