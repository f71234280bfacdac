// src/geo-location.ts
// Клиент IPGeolocation: дата и время в указанном месте
import { z } from "zod";
import type { ProviderConfig } from "./config";
import { ProtocolError } from "./errors";
import { buildUrl, getJson, parseBody } from "./http";
import type { Logger } from "./logger";

export interface TimeRecord {
    date: string; // YYYY-MM-DD
    time: string; // HH:mm:ss, 24 часа
}

const timeResponseSchema = z.object({
    date: z.string(),
    time_24: z.string(),
});

export class GeoLocationClient {
    private readonly config: ProviderConfig;
    private readonly logger: Logger;

    constructor(config: ProviderConfig, logger: Logger) {
        this.config = config;
        this.logger = logger.child({ module: "geo-location" });
    }

    async fetchTime(location: string): Promise<TimeRecord> {
        if (location.trim() === "") {
            throw new ProtocolError("Время: пустое название места");
        }
        this.logger.info({ location }, "Запрашиваем время");

        const url = buildUrl(this.config.endpoint, { apiKey: this.config.apiKey, location });
        try {
            const body = await getJson(url, "IPGeolocation");
            const { date, time_24 } = parseBody(timeResponseSchema, body, "IPGeolocation");
            const record: TimeRecord = { date, time: time_24 };
            this.logger.debug({ record }, "Время получено");
            return record;
        } catch (e) {
            this.logger.error({ err: e, location }, "Не удалось получить время");
            throw e;
        }
    }
}
