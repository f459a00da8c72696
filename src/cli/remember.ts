import { withManager, readInput, type GlobalOptions } from "./util.js";

export interface RememberOptions {
  text?: string;
  file?: string;
  user?: string;
  context: string;
  date?: string;
}

export async function rememberCommand(options: RememberOptions, global: GlobalOptions): Promise<void> {
  const content = readInput(options);
  await withManager(global, async ({ manager }) => {
    const result = await manager.remember(content, {
      userId: options.user,
      context: options.context,
      timeContext: options.date,
    });

    for (const record of result.stored) {
      console.log(`Stored: ${record.text}`);
    }
    for (const { fact, reason } of result.validation.invalid) {
      console.log(`Rejected: ${fact.text} (${reason})`);
    }
    if (result.extracted.length === 0) {
      console.log("No facts found.");
    }
  });
}
