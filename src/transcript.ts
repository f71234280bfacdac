// src/transcript.ts
// История диалога одной сессии. Только растёт, на диск не пишется.
import type OpenAI from "openai";
import type { ChatMessage } from "./model";
import type { RawToolCall, ToolResult } from "./tools";

export class Transcript {
    private readonly turns: ChatMessage[] = [];

    constructor(systemPrompt?: string) {
        if (systemPrompt) {
            this.turns.push({ role: "system", content: systemPrompt });
        }
    }

    // Копия: снимок истории на момент запроса
    get messages(): readonly ChatMessage[] {
        return [...this.turns];
    }

    appendUser(text: string): void {
        this.turns.push({ role: "user", content: text });
    }

    appendAssistantText(text: string): void {
        this.turns.push({ role: "assistant", content: text });
    }

    // Ответ модели с tool_calls должен попасть в историю до результатов
    appendToolCalls(content: string | null, calls: readonly RawToolCall[]): void {
        this.turns.push({
            role: "assistant",
            content,
            tool_calls: calls.map((call): OpenAI.ChatCompletionMessageToolCall => ({
                id: call.id,
                type: "function",
                function: { name: call.function.name, arguments: call.function.arguments },
            })),
        });
    }

    appendToolResult(result: ToolResult): void {
        this.turns.push({
            role: "tool",
            tool_call_id: result.callId,
            content: JSON.stringify(result.payload),
        });
    }
}
