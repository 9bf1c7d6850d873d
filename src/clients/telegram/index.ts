export { TelegramChannelClient } from "./telegramChannelClient";
export type { TelegramChannelClientConfig } from "./telegramChannelClient";
