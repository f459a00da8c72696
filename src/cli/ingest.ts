import { withManager, type GlobalOptions } from "./util.js";

export async function ingestCommand(directories: string[], global: GlobalOptions): Promise<void> {
  await withManager(global, async ({ manager }) => {
    const summary = await manager.ingestDirectories(directories.length > 0 ? directories : undefined);

    console.log(`Files:     ${summary.files}`);
    console.log(`Sections:  ${summary.sections}`);
    console.log(`Extracted: ${summary.extracted}`);
    console.log(`Stored:    ${summary.stored}`);
    console.log(`Rejected:  ${summary.rejected}`);
    if (summary.failures.length > 0) {
      console.log(`Failures:  ${summary.failures.length}`);
      for (const failure of summary.failures) {
        console.log(`  ${failure.source}: ${failure.error}`);
      }
      process.exitCode = 1;
    }
  });
}
