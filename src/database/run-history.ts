import { Low } from 'lowdb';
import type { Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import type { DiscoveryRun, SummarizationRun } from '../types/paper.js';

export interface RunDatabase {
  discoveries: DiscoveryRun[];
  summarizations: SummarizationRun[];
}

function emptyDatabase(): RunDatabase {
  return { discoveries: [], summarizations: [] };
}

/** Append-only ledger of discovery and summarization runs. */
export class RunHistory {
  private db: Low<RunDatabase>;
  private loaded = false;

  constructor(adapter: Adapter<RunDatabase>) {
    this.db = new Low(adapter, emptyDatabase());
  }

  static atPath(filePath: string): RunHistory {
    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    return new RunHistory(new JSONFile<RunDatabase>(filePath));
  }

  private async getData(): Promise<RunDatabase> {
    if (!this.loaded) {
      await this.db.read();
      this.loaded = true;
    }
    return this.db.data;
  }

  async recordDiscovery(run: DiscoveryRun): Promise<void> {
    const data = await this.getData();
    data.discoveries.push(run);
    await this.db.write();
  }

  async recordSummarization(run: SummarizationRun): Promise<void> {
    const data = await this.getData();
    data.summarizations.push(run);
    await this.db.write();
  }

  async listDiscoveries(): Promise<DiscoveryRun[]> {
    const data = await this.getData();
    return [...data.discoveries].sort(
      (a, b) => new Date(b.startedAt).getTime() - new Date(a.startedAt).getTime()
    );
  }

  async findSummarizationsFor(discoveryRunId: string): Promise<SummarizationRun[]> {
    const data = await this.getData();
    return data.summarizations.filter((run) => run.discoveryRunId === discoveryRunId);
  }
}
