import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NetworkError, ParseError, ProtocolError } from "./errors";
import { GeoLocationClient } from "./geo-location";
import { makeNoopLogger } from "./logger";

const mockFetch = vi.fn();

describe("GeoLocationClient", () => {
    const client = new GeoLocationClient(
        { apiKey: "test-geo-key", endpoint: "https://api.ipgeolocation.io/timezone" },
        makeNoopLogger(),
    );

    beforeEach(() => {
        mockFetch.mockReset();
        vi.stubGlobal("fetch", mockFetch);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it("возвращает дату и время в 24-часовом формате", async () => {
        mockFetch.mockResolvedValueOnce({
            ok: true,
            status: 200,
            statusText: "OK",
            json: async () => ({
                timezone: "Asia/Tokyo",
                date: "2024-06-01",
                time_24: "21:15:00",
                time_12: "09:15:00 PM",
            }),
        });

        const record = await client.fetchTime("Tokyo");

        expect(record).toEqual({ date: "2024-06-01", time: "21:15:00" });
        expect(mockFetch).toHaveBeenCalledWith(
            "https://api.ipgeolocation.io/timezone?apiKey=test-geo-key&location=Tokyo",
        );
    });

    it("превращает не-2xx в NetworkError", async () => {
        mockFetch.mockResolvedValueOnce({
            ok: false,
            status: 423,
            statusText: "Locked",
            json: async () => ({ message: "Provided location is not valid." }),
        });

        const error = await client.fetchTime("Atlantis").catch((e: unknown) => e);

        expect(error).toBeInstanceOf(NetworkError);
        expect(error).toHaveProperty("status", 423);
    });

    it("требует оба поля", async () => {
        mockFetch.mockResolvedValueOnce({
            ok: true,
            status: 200,
            statusText: "OK",
            json: async () => ({ date: "2024-06-01" }),
        });

        const error = await client.fetchTime("Tokyo").catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ParseError);
        expect(error).toHaveProperty("message", "IPGeolocation: неожиданный формат ответа (time_24: Required)");
    });

    it("превращает сбой сети в NetworkError", async () => {
        mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

        await expect(client.fetchTime("Tokyo")).rejects.toThrow(
            new NetworkError("IPGeolocation: запрос не выполнен: fetch failed"),
        );
    });

    it("превращает не-JSON тело в ParseError", async () => {
        mockFetch.mockResolvedValueOnce({
            ok: true,
            status: 200,
            statusText: "OK",
            json: async () => {
                throw new SyntaxError("Unexpected token < in JSON at position 0");
            },
        });

        await expect(client.fetchTime("Tokyo")).rejects.toBeInstanceOf(ParseError);
    });

    it("не ходит в сеть с пустым местом", async () => {
        await expect(client.fetchTime("")).rejects.toBeInstanceOf(ProtocolError);
        expect(mockFetch).not.toHaveBeenCalled();
    });
});
