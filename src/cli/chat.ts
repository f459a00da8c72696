import { prompt, withManager, type GlobalOptions } from "./util.js";

const EXIT_WORDS = new Set(["exit", "quit", "bye"]);

/** One answer for a query argument, otherwise an interactive session. */
export async function chatCommand(
  query: string | undefined,
  options: { user?: string },
  global: GlobalOptions
): Promise<void> {
  await withManager(global, async ({ manager }) => {
    if (query !== undefined) {
      console.log(await manager.chat(query, { userId: options.user }));
      return;
    }

    console.error('Ask about the user; type "exit" to leave.');
    for (;;) {
      const line = await prompt("> ");
      if (!line || EXIT_WORDS.has(line.toLowerCase())) return;
      console.log(await manager.chat(line, { userId: options.user }));
    }
  });
}
