import { PromptManager } from "../core/prompts.js";
import { listPlaceholders } from "../core/template.js";

export interface PromptOptions {
  var: Record<string, string>;
  placeholders?: boolean;
}

export function promptCommand(category: string, name: string, options: PromptOptions): void {
  const prompts = new PromptManager();
  if (options.placeholders) {
    for (const placeholder of listPlaceholders(prompts.getTemplate(category, name))) {
      console.log(placeholder);
    }
    return;
  }
  console.log(prompts.getPrompt(category, name, options.var));
}
