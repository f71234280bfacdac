// src/app.ts
// Сборка приложения: конфиг → клиенты → чат-цикл. Возвращает код выхода.
import { ChatSession } from "./chat";
import { loadConfig, type Env } from "./config";
import { describeError } from "./errors";
import { GeoLocationClient } from "./geo-location";
import { makeLogger, type Logger } from "./logger";
import { OpenAIChatModel, type ChatModel } from "./model";
import { createTerminalPrompt, type Prompt } from "./prompt";
import { WeatherClient } from "./weather";

// Всё, что можно подменить снаружи (в тестах — фейки)
export interface ChatDeps {
    model?: ChatModel;
    prompt?: Prompt;
    logger?: Logger;
    print?: (text: string) => void;
    printError?: (text: string) => void;
}

/** 0 — пользователь вышел (`exit` или конец stdin), 1 — любая ошибка. */
export async function runChat(env: Env, deps: ChatDeps = {}): Promise<number> {
    const printError = deps.printError ?? ((text) => console.error(text));
    try {
        await chat(env, deps);
        return 0;
    } catch (e) {
        printError(`Ошибка: ${describeError(e)}`);
        return 1;
    }
}

async function chat(env: Env, deps: ChatDeps): Promise<void> {
    const config = loadConfig(env);
    const logger = deps.logger ?? makeLogger(config.logLevel);

    const prompt = deps.prompt ?? createTerminalPrompt();
    const session = new ChatSession({
        model: deps.model ?? new OpenAIChatModel(config.model, logger),
        tools: {
            weather: new WeatherClient(config.weather, logger),
            geoLocation: new GeoLocationClient(config.geoLocation, logger),
        },
        prompt,
        logger,
        print: deps.print,
        maxToolRounds: config.maxToolRounds,
    });

    try {
        await session.run();
    } catch (e) {
        logger.fatal({ err: e }, "Сессия прервана");
        throw e;
    } finally {
        prompt.close();
    }
}
