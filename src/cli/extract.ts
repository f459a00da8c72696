import { FactExtractor } from "../core/extractor.js";
import { readInput } from "./util.js";

export interface ExtractOptions {
  text?: string;
  file?: string;
  context: string;
  date?: string;
  json?: boolean;
}

export function extractCommand(options: ExtractOptions): void {
  const facts = new FactExtractor().extract({
    content: readInput(options),
    context: options.context,
    timeContext: options.date,
  });

  if (options.json) {
    console.log(JSON.stringify(facts, null, 2));
    return;
  }
  if (facts.length === 0) {
    console.log("No facts found.");
    return;
  }
  for (const fact of facts) {
    console.log(fact.text);
  }
}
