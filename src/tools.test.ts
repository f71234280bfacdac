import { describe, expect, it, vi } from "vitest";
import { NetworkError, ProtocolError, ToolExecutionError } from "./errors";
import {
    TOOL_DECLARATIONS,
    executeToolCall,
    parseToolCall,
    toOpenAITools,
} from "./tools";

function rawCall(name: string, args: string, id = "call_1") {
    return { id, function: { name, arguments: args } };
}

describe("объявления tools", () => {
    it("объявляет ровно погоду и время", () => {
        expect(TOOL_DECLARATIONS.map((d) => d.name)).toEqual(["get_weather", "get_current_time"]);
    });

    it("переводит объявления в формат OpenAI", () => {
        const [weather] = toOpenAITools(TOOL_DECLARATIONS);

        expect(weather).toMatchObject({
            type: "function",
            function: {
                name: "get_weather",
                parameters: { type: "object", required: ["location"] },
            },
        });
    });
});

describe("parseToolCall", () => {
    it("разбирает вызов погоды с единицей по умолчанию", () => {
        expect(parseToolCall(rawCall("get_weather", '{"location":"Paris"}'))).toEqual({
            id: "call_1",
            name: "get_weather",
            args: { location: "Paris", unit: "C" },
        });
    });

    it("разбирает вызов времени и обрезает пробелы", () => {
        expect(parseToolCall(rawCall("get_current_time", '{"location":"  Tokyo "}', "call_7"))).toEqual({
            id: "call_7",
            name: "get_current_time",
            args: { location: "Tokyo" },
        });
    });

    it("отвергает необъявленный tool", () => {
        expect(() => parseToolCall(rawCall("get_stock_price", '{"ticker":"ACME"}'))).toThrow(
            new ProtocolError('Модель запросила необъявленный tool "get_stock_price"'),
        );
    });

    it("отвергает аргументы, которые не JSON", () => {
        expect(() => parseToolCall(rawCall("get_weather", "{location:"))).toThrow(ProtocolError);
    });

    it("требует location", () => {
        expect(() => parseToolCall(rawCall("get_weather", "{}"))).toThrow(
            'Некорректные аргументы "get_weather" (location: Required)',
        );
        expect(() => parseToolCall(rawCall("get_current_time", ""))).toThrow(ProtocolError);
    });

    it("отвергает неизвестную единицу температуры", () => {
        expect(() => parseToolCall(rawCall("get_weather", '{"location":"Paris","unit":"K"}'))).toThrow(
            ProtocolError,
        );
    });
});

describe("executeToolCall", () => {
    function fakeClients() {
        return {
            weather: { fetchWeather: vi.fn() },
            geoLocation: { fetchTime: vi.fn() },
        };
    }

    it("вызывает клиент погоды", async () => {
        const clients = fakeClients();
        clients.weather.fetchWeather.mockResolvedValueOnce({ temperature: 64.4, condition: "Cloudy", humidity: 72 });

        const result = await executeToolCall(
            { id: "call_1", name: "get_weather", args: { location: "Paris", unit: "F" } },
            clients,
        );

        expect(result).toEqual({
            callId: "call_1",
            name: "get_weather",
            payload: { temperature: 64.4, condition: "Cloudy", humidity: 72 },
        });
        expect(clients.weather.fetchWeather).toHaveBeenCalledWith("Paris", "F");
        expect(clients.geoLocation.fetchTime).not.toHaveBeenCalled();
    });

    it("вызывает клиент времени", async () => {
        const clients = fakeClients();
        clients.geoLocation.fetchTime.mockResolvedValueOnce({ date: "2024-06-01", time: "21:15:00" });

        const result = await executeToolCall(
            { id: "call_2", name: "get_current_time", args: { location: "Tokyo" } },
            clients,
        );

        expect(result.payload).toEqual({ date: "2024-06-01", time: "21:15:00" });
        expect(clients.geoLocation.fetchTime).toHaveBeenCalledWith("Tokyo");
    });

    it("оборачивает сбой клиента в ToolExecutionError", async () => {
        const clients = fakeClients();
        const cause = new NetworkError("WeatherAPI: HTTP 401 Unauthorized", { status: 401 });
        clients.weather.fetchWeather.mockRejectedValueOnce(cause);

        const error = await executeToolCall(
            { id: "call_1", name: "get_weather", args: { location: "Paris", unit: "C" } },
            clients,
        ).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ToolExecutionError);
        expect(error).toHaveProperty("cause", cause);
        expect(error).toHaveProperty(
            "message",
            'Tool "get_weather" не выполнился: WeatherAPI: HTTP 401 Unauthorized',
        );
    });
});
