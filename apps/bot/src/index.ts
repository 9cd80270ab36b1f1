import { startBot } from "./bot.js";

await startBot();
