import { withManager, type GlobalOptions } from "./util.js";

export interface SearchOptions {
  user?: string;
  limit: number;
  json?: boolean;
}

export async function searchCommand(query: string, options: SearchOptions, global: GlobalOptions): Promise<void> {
  await withManager(global, async ({ manager }) => {
    const results = await manager.searchMemories(query, { userId: options.user, limit: options.limit });

    if (options.json) {
      console.log(JSON.stringify(results, null, 2));
      return;
    }
    if (results.length === 0) {
      console.log("No matching memories.");
      return;
    }
    for (const { record, score } of results) {
      console.log(`${score.toFixed(2)}  ${record.text}`);
    }
  });
}
