// src/weather.ts
// Клиент WeatherAPI: текущая погода по названию места
import { z } from "zod";
import type { ProviderConfig } from "./config";
import { ProtocolError } from "./errors";
import { buildUrl, getJson, parseBody } from "./http";
import type { Logger } from "./logger";

export type TemperatureUnit = "C" | "F";

export interface WeatherRecord {
    temperature: number;
    condition: string;
    humidity: number;
}

// Формат api.weatherapi.com/v1/current.json — только нужные поля
const weatherResponseSchema = z.object({
    current: z.object({
        temp_c: z.number(),
        temp_f: z.number(),
        condition: z.object({ text: z.string() }),
        humidity: z.number(),
    }),
});

export class WeatherClient {
    private readonly config: ProviderConfig;
    private readonly logger: Logger;

    constructor(config: ProviderConfig, logger: Logger) {
        this.config = config;
        this.logger = logger.child({ module: "weather" });
    }

    async fetchWeather(location: string, unit: TemperatureUnit = "C"): Promise<WeatherRecord> {
        if (location.trim() === "") {
            throw new ProtocolError("Погода: пустое название места");
        }
        this.logger.info({ location }, "Запрашиваем погоду");

        const url = buildUrl(this.config.endpoint, { key: this.config.apiKey, q: location });
        try {
            const body = await getJson(url, "WeatherAPI");
            const { current } = parseBody(weatherResponseSchema, body, "WeatherAPI");
            const record: WeatherRecord = {
                temperature: unit === "F" ? current.temp_f : current.temp_c,
                condition: current.condition.text,
                humidity: current.humidity,
            };
            this.logger.debug({ record }, "Погода получена");
            return record;
        } catch (e) {
            this.logger.error({ err: e, location }, "Не удалось получить погоду");
            throw e;
        }
    }
}
