// src/tools.ts
// Объявления tools для модели и диспетчер вызовов
import type OpenAI from "openai";
import { z } from "zod";
import { ProtocolError, ToolExecutionError, describeError } from "./errors";
import type { GeoLocationClient, TimeRecord } from "./geo-location";
import type { WeatherClient, WeatherRecord } from "./weather";

// ============================================================
// ОБЪЯВЛЕНИЯ: единственный контракт между нами и моделью
// ============================================================

export interface ToolDeclaration {
    readonly name: ToolName;
    readonly description: string;
    readonly parameters: Readonly<Record<string, unknown>>;
}

export const TOOL_DECLARATIONS: readonly ToolDeclaration[] = [
    {
        name: "get_weather",
        description: "Получить текущую погоду в указанном месте",
        parameters: {
            type: "object",
            properties: {
                location: {
                    type: "string",
                    description: "Город латиницей, можно со страной через запятую (например \"Paris,FR\")",
                },
                unit: {
                    type: "string",
                    enum: ["C", "F"],
                    description: "Единица температуры: C (Цельсий) или F (Фаренгейт)",
                },
            },
            required: ["location"],
        },
    },
    {
        name: "get_current_time",
        description: "Получить текущие дату и время в указанном месте",
        parameters: {
            type: "object",
            properties: {
                location: {
                    type: "string",
                    description: "Город латиницей, можно со страной через запятую (например \"Tokyo,JP\")",
                },
            },
            required: ["location"],
        },
    },
];

export function toOpenAITools(declarations: readonly ToolDeclaration[]): OpenAI.ChatCompletionTool[] {
    return declarations.map((declaration): OpenAI.ChatCompletionTool => ({
        type: "function",
        function: {
            name: declaration.name,
            description: declaration.description,
            parameters: { ...declaration.parameters },
        },
    }));
}

// ============================================================
// ВЫЗОВЫ: закрытое множество, каждый вариант со своими аргументами
// ============================================================

const weatherArgsSchema = z.object({
    location: z.string().trim().min(1),
    unit: z.enum(["C", "F"]).default("C"),
});

const timeArgsSchema = z.object({
    location: z.string().trim().min(1),
});

export type WeatherArgs = z.infer<typeof weatherArgsSchema>;
export type TimeArgs = z.infer<typeof timeArgsSchema>;

export type ToolCall =
    | { id: string; name: "get_weather"; args: WeatherArgs }
    | { id: string; name: "get_current_time"; args: TimeArgs };

export type ToolName = ToolCall["name"];

// То, что приходит от модели в message.tool_calls
export interface RawToolCall {
    id: string;
    function: { name: string; arguments: string };
}

export function parseToolCall(raw: RawToolCall): ToolCall {
    const { id } = raw;
    const { name, arguments: json } = raw.function;

    switch (name) {
        case "get_weather":
            return { id, name, args: parseArgs(weatherArgsSchema, name, json) };
        case "get_current_time":
            return { id, name, args: parseArgs(timeArgsSchema, name, json) };
        default:
            throw new ProtocolError(`Модель запросила необъявленный tool "${name}"`);
    }
}

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, name: string, json: string): T {
    let value: unknown;
    try {
        // Некоторые модели шлют пустую строку вместо {}
        value = json.trim() === "" ? {} : JSON.parse(json);
    } catch (e) {
        throw new ProtocolError(`Аргументы "${name}" не JSON: ${describeError(e)}`);
    }

    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : parsed.error.message;
        throw new ProtocolError(`Некорректные аргументы "${name}" (${where})`);
    }
    return parsed.data;
}

// ============================================================
// ДИСПЕТЧЕР
// ============================================================

export interface ToolClients {
    weather: Pick<WeatherClient, "fetchWeather">;
    geoLocation: Pick<GeoLocationClient, "fetchTime">;
}

export type ToolResult =
    | { callId: string; name: "get_weather"; payload: WeatherRecord }
    | { callId: string; name: "get_current_time"; payload: TimeRecord };

export async function executeToolCall(call: ToolCall, clients: ToolClients): Promise<ToolResult> {
    try {
        switch (call.name) {
            case "get_weather": {
                const payload = await clients.weather.fetchWeather(call.args.location, call.args.unit);
                return { callId: call.id, name: call.name, payload };
            }
            case "get_current_time": {
                const payload = await clients.geoLocation.fetchTime(call.args.location);
                return { callId: call.id, name: call.name, payload };
            }
            default:
                return assertNever(call);
        }
    } catch (e) {
        throw new ToolExecutionError(call.name, e);
    }
}

function assertNever(value: never): never {
    throw new ProtocolError(`Неизвестный вариант tool call: ${JSON.stringify(value)}`);
}
