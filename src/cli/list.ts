import { withManager, type GlobalOptions } from "./util.js";

export async function listCommand(options: { user?: string }, global: GlobalOptions): Promise<void> {
  await withManager(global, async ({ manager }) => {
    const records = await manager.getAllMemories(options.user);
    if (records.length === 0) {
      console.log("No memories stored.");
      return;
    }

    console.log(`${records.length} memor${records.length === 1 ? "y" : "ies"}:\n`);
    for (const record of records) {
      console.log(`  ${record.text}`);
      console.log(`    Id:      ${record.id}`);
      if (record.context) console.log(`    Context: ${record.context}`);
      if (record.temporalContext) console.log(`    Date:    ${record.temporalContext}`);
      console.log(`    Created: ${record.createdAt}`);
      console.log();
    }
  });
}
