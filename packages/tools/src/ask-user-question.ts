import { z } from "zod";
import { defineTool, type ToolHandler } from "@agenda/runtime";
import { toolFailure, toolResult } from "./result.js";

export const QUESTION_TYPES = ["single_choice", "multi_choice", "boolean"] as const;
export type QuestionType = (typeof QUESTION_TYPES)[number];

export interface QuestionOption {
  label: string;
  text: string;
}

export interface ClarificationQuestion {
  question: string;
  questionType: QuestionType;
  options: QuestionOption[];
}

const AskUserQuestionArgs = z.object({
  question: z.string().trim().min(1).describe("The question to ask"),
  question_type: z
    .string()
    .default("single_choice")
    .describe("One of single_choice, multi_choice, boolean"),
  options: z.array(z.string()).optional().describe("Choices for single_choice and multi_choice, at least two"),
});

const ANSWER_HINTS: Record<QuestionType, string> = {
  single_choice: "Pick **one** option and reply with its letter.",
  multi_choice: "Pick **one or more** options and reply with their letters, separated by commas (e.g. A,C).",
  boolean: "Reply with **yes** or **no**.",
};

function isQuestionType(value: string): value is QuestionType {
  return QUESTION_TYPES.some((type) => type === value);
}

function optionLabel(index: number): string {
  return index < 26 ? String.fromCharCode(65 + index) : `Option ${index + 1}`;
}

export function renderQuestion(question: ClarificationQuestion): string {
  const lines = [`**Question type**: ${question.questionType}`, "", `**Question**: ${question.question}`];

  if (question.options.length > 0) {
    lines.push("", "**Options:**", "");
    for (const option of question.options) {
      lines.push(`- ${option.label}. ${option.text}`);
    }
  }

  lines.push("", ANSWER_HINTS[question.questionType]);
  return lines.join("\n");
}

/**
 * Asks the user to clarify an ambiguous request. Has no side effect: the
 * rendered markdown ends the agent cycle and is shown to the user as the
 * reply.
 */
export function askUserQuestionTool(): ToolHandler {
  return defineTool({
    description:
      "Ask the user a clarifying question when the request is ambiguous. The question is shown to the user and the turn ends.",
    schema: AskUserQuestionArgs,
    async execute(args) {
      const questionType = args.question_type.trim();
      if (!isQuestionType(questionType)) {
        return toolFailure(
          "askUserQuestion",
          `Unsupported question_type "${questionType}". Use one of: ${QUESTION_TYPES.join(", ")}.`,
        );
      }

      const texts = (args.options ?? []).map((text) => text.trim()).filter((text) => text.length > 0);
      if (questionType !== "boolean" && texts.length < 2) {
        return toolFailure("askUserQuestion", `${questionType} questions need at least two non-empty options.`);
      }

      const question: ClarificationQuestion = {
        question: args.question,
        questionType,
        options: questionType === "boolean" ? [] : texts.map((text, i) => ({ label: optionLabel(i), text })),
      };
      const markdown = renderQuestion(question);

      return {
        ...toolResult("askUserQuestion", true, { message: "Question sent to the user.", data: question }),
        reply: markdown,
      };
    },
  });
}
