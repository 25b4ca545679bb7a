/**
 * Operator notifications over the Telegram Bot API.
 * Fire-and-forget: failures are logged, never thrown. A no-op when
 * TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID are not set.
 */
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

async function send(text: string): Promise<void> {
  const token = env.TELEGRAM_BOT_TOKEN;
  const chatId = env.TELEGRAM_CHAT_ID;
  if (!token || !chatId) {
    logger.debug('Telegram not configured, dropping notification', { text });
    return;
  }
  try {
    const res = await fetch(`https://api.telegram.org/bot${token}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: chatId, text, parse_mode: 'HTML' }),
      signal: AbortSignal.timeout(5_000),
    });
    if (!res.ok) logger.warn('Telegram send failed', { status: res.status });
  } catch (err) {
    logger.warn('Telegram unreachable', { error: String(err) });
  }
}

export const telegram = {
  alert: (msg: string) => send(`⚠️ ${msg}`),
};
