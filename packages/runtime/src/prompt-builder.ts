import { readFile } from "node:fs/promises";
import { format } from "date-fns";
import type { ToolSchema } from "@agenda/types";

export const DEFAULT_SYSTEM_PROMPT = `You are a personal scheduling assistant running on {{MODEL_NAME}}.

# Context
Current local time: {{CURRENT_TIME}}

# Available Tools
{{TOOLS}}

# Working Rules
1. Dates and times you pass to tools use the format YYYY-MM-DD HH:MM in local time.
   Resolve relative expressions ("tomorrow at 3pm") against the current time.
2. Before updating or deleting a schedule, look up its id with list_schedules.
3. If the request is ambiguous (missing date, several matching schedules),
   call askUserQuestion instead of guessing.
4. After a tool call, tell the user in one or two sentences what changed.
`;

export interface SystemPromptInput {
  /** Template with `{{MODEL_NAME}}`, `{{CURRENT_TIME}}` and `{{TOOLS}}` placeholders. */
  template?: string;
  modelName: string;
  tools: ReadonlyArray<ToolSchema>;
  now?: Date;
}

/**
 * Renders the system prompt. Unknown placeholders are left untouched.
 */
export function buildSystemPrompt(input: SystemPromptInput): string {
  const toolList =
    input.tools.length > 0
      ? input.tools.map((t) => `- **${t.name}**: ${t.description}`).join("\n")
      : "- (no tools available)";

  const values: Record<string, string> = {
    MODEL_NAME: input.modelName,
    CURRENT_TIME: format(input.now ?? new Date(), "yyyy-MM-dd HH:mm"),
    TOOLS: toolList,
  };

  return (input.template ?? DEFAULT_SYSTEM_PROMPT).replace(
    /\{\{(\w+)\}\}/g,
    (match, key: string) => values[key] ?? match,
  );
}

export async function loadPromptTemplate(filePath: string): Promise<string> {
  return readFile(filePath, "utf8");
}
