import { prompt, withManager, type GlobalOptions } from "./util.js";

export async function resetCommand(options: { user?: string; yes?: boolean }, global: GlobalOptions): Promise<void> {
  await withManager(global, async ({ manager }) => {
    const userId = options.user ?? manager.userId;
    if (!options.yes) {
      const answer = await prompt(`Delete all memories of "${userId}"? [y/N] `);
      if (!/^y(es)?$/i.test(answer)) {
        console.log("Aborted.");
        return;
      }
    }

    const deleted = await manager.resetMemories(userId);
    console.log(`Deleted ${deleted} memor${deleted === 1 ? "y" : "ies"}.`);
  });
}
