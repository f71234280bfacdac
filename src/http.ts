// src/http.ts
// Общая обвязка для HTTP-провайдеров: GET + JSON, без ретраев
import type { z } from "zod";
import { NetworkError, ParseError, describeError } from "./errors";

export function buildUrl(endpoint: string, query: Record<string, string>): string {
    const url = new URL(endpoint);
    for (const [key, value] of Object.entries(query)) {
        url.searchParams.set(key, value);
    }
    return url.toString();
}

/**
 * Один GET-запрос. Возвращает разобранный JSON как `unknown` —
 * форму проверяет вызывающий.
 *
 * @param provider имя провайдера для текста ошибки
 */
export async function getJson(url: string, provider: string): Promise<unknown> {
    let response: Response;
    try {
        response = await fetch(url);
    } catch (e) {
        throw new NetworkError(`${provider}: запрос не выполнен: ${describeError(e)}`, { cause: e });
    }

    if (!response.ok) {
        throw new NetworkError(
            `${provider}: HTTP ${response.status} ${response.statusText}`.trim(),
            { status: response.status },
        );
    }

    try {
        return await response.json();
    } catch (e) {
        throw new ParseError(`${provider}: ответ не JSON: ${describeError(e)}`, { cause: e });
    }
}

export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, provider: string): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? `${issue.path.join(".")}: ${issue.message}` : parsed.error.message;
        throw new ParseError(`${provider}: неожиданный формат ответа (${where})`);
    }
    return parsed.data;
}
