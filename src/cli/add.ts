import { withManager, type GlobalOptions } from "./util.js";

export interface AddOptions {
  user?: string;
  context?: string;
  metadata: Record<string, string>;
}

export async function addCommand(fact: string, options: AddOptions, global: GlobalOptions): Promise<void> {
  await withManager(global, async ({ manager }) => {
    const outcome = await manager.addFact(fact, {
      userId: options.user,
      context: options.context,
      metadata: options.metadata,
    });

    if (outcome.status === "rejected") {
      console.error(`Rejected: ${outcome.fact.text} (${outcome.reason})`);
      process.exitCode = 1;
      return;
    }
    console.log(`Stored: ${outcome.record.text} [${outcome.record.id}]`);
  });
}
