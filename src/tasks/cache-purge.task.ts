import { ITask } from '../types/task.types';
import { ResolutionCache } from '../services/resolution-cache.service';

export class CachePurgeTask implements ITask {
  name = 'CachePurgeTask';
  private cache: ResolutionCache;

  constructor(cache: ResolutionCache) {
    this.cache = cache;
  }

  async execute(): Promise<void> {
    console.log(`\n[${new Date().toISOString()}] Starting ${this.name}...`);

    const removed = this.cache.purgeExpired();
    const stats = this.cache.getStats();

    console.log('\n=== Cache Purge ===');
    console.log(`Expired entries removed: ${removed}`);
    console.log(`Entries remaining: ${stats.entries}`);
    console.log(`Hits: ${stats.hits}  Misses: ${stats.misses}  Errors: ${stats.errors}`);
    console.log('===================\n');
  }
}
