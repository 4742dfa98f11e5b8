import type { ChatProvider, GenerateAnswerOptions } from "../types";
import { DOCUMENT_SEPARATOR, NO_CONTEXT_SENTINEL } from "../../query/context";

const FINDING_PREVIEW_LENGTH = 200;

export const FORMATTING_DISCLAIMER =
    "_Note: No generation backend is configured, so this answer only restates the retrieved data. "
    + "Set BANKRAG_LLM_CHAT_PROVIDER to openai, google, anthropic or ollama for natural language answers._";

/**
 * Answers without any backend by restating the retrieved context, one
 * finding per document chunk.
 */
export class FormattingChatProvider implements ChatProvider {
    readonly name = "mock";

    async generate(options: GenerateAnswerOptions): Promise<string> {
        const context = options.context.trim();
        if (context === NO_CONTEXT_SENTINEL) {
            return NO_CONTEXT_SENTINEL;
        }

        const lines: string[] = [
            "=== Banking Assistant (formatting mode) ===",
            "",
            `**Query:** ${options.query.trim()}`,
            "",
            "**Based on retrieved banking data:**",
            "",
        ];

        const chunks = context
            .split(DOCUMENT_SEPARATOR)
            .map((chunk) => chunk.trim())
            .filter((chunk) => chunk.length > 0);

        if (chunks.length === 0) {
            lines.push(NO_CONTEXT_SENTINEL, "");
        }

        chunks.forEach((chunk, index) => {
            const preview = chunk.length > FINDING_PREVIEW_LENGTH
                ? `${chunk.slice(0, FINDING_PREVIEW_LENGTH)}...`
                : chunk;
            lines.push(`**Finding ${index + 1}:** ${preview}`, "");
        });

        lines.push(FORMATTING_DISCLAIMER);
        return lines.join("\n");
    }
}
