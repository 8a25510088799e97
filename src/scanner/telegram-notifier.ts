import {setTimeout} from 'node:timers/promises'
import type {Logger} from 'pino'
import {NotifyError} from '../errors.js'
import type {TelegramConfig} from '../types.js'
import {createLogger} from '../core/reporter.js'

export type FetchResponse = {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: {method: string; headers: Record<string, string>; body: string}) => Promise<FetchResponse>

export type NotificationKind = 'success' | 'error'

export type TelegramNotifierOptions = {
  fetch?: FetchLike;
  logger?: Logger;
  apiBase?: string;
  /** Total attempts per message. */
  attempts?: number;
  retryDelayMs?: number;
}

/**
 * Posts HTML messages to a Telegram chat through the Bot API.
 * Delivery failures are logged and never thrown.
 */
export class TelegramNotifier {
  readonly enabled: boolean
  private readonly fetch: FetchLike
  private readonly logger: Logger
  private readonly apiBase: string
  private readonly attempts: number
  private readonly retryDelayMs: number

  constructor(private readonly config: TelegramConfig, options: TelegramNotifierOptions = {}) {
    this.fetch = options.fetch ?? globalThis.fetch
    this.logger = options.logger ?? createLogger('telegram')
    this.apiBase = options.apiBase ?? 'https://api.telegram.org'
    this.attempts = options.attempts ?? 3
    this.retryDelayMs = options.retryDelayMs ?? 1000

    if (config.enabled && (!config.token || !config.chatId)) {
      this.logger.warn('Telegram notifications enabled but token or chat id is missing; disabled')
      this.enabled = false
    } else {
      this.enabled = config.enabled
    }
  }

  /** Whether the configured level lets this kind of message through. */
  accepts(kind: NotificationKind): boolean {
    if (!this.enabled) {
      return false
    }

    return this.config.level === 'all' || this.config.level === kind
  }

  /**
   * @returns True when the message was delivered
   */
  async send(text: string, kind: NotificationKind): Promise<boolean> {
    if (!this.accepts(kind)) {
      return false
    }

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        await this.post(text)
        this.logger.debug('Telegram notification sent')
        return true
      } catch (error) {
        if (attempt < this.attempts) {
          this.logger.warn({err: error, attempt, attempts: this.attempts}, 'Telegram notification failed, retrying')
          await setTimeout(this.retryDelayMs)
          continue
        }

        this.logger.error({err: error}, 'Telegram notification failed')
      }
    }

    return false
  }

  private async post(text: string): Promise<void> {
    const response = await this.fetch(`${this.apiBase}/bot${this.config.token ?? ''}/sendMessage`, {
      method: 'POST',
      headers: {'content-type': 'application/json'},
      body: JSON.stringify({chat_id: this.config.chatId, text, parse_mode: 'HTML'})
    })

    if (!response.ok) {
      throw new NotifyError(`Telegram API responded ${response.status}: ${await response.text()}`)
    }
  }
}
