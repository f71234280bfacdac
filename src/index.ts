// src/index.ts
// Точка входа. Запуск: npx tsx src/index.ts
import dotenv from "dotenv";
import { runChat } from "./app";

dotenv.config();

process.exit(await runChat(process.env));
