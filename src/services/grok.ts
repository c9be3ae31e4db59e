import dayjs from 'dayjs';
import OpenAI from 'openai';
import { z } from 'zod';
import { AnalysisUnavailable, describeError } from '../core/errors.js';
import { silentLogger, type BotLogger } from '../market/logging.js';
import type { AnalysisGateway, MarketContext, Recommendation } from '../market/types.js';

export const GROK_BASE_URL = 'https://api.x.ai/v1';
export const DEFAULT_GROK_MODEL = 'grok-3-mini';

export type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };
export type ChatCompletionFn = (messages: ChatMessage[]) => Promise<string>;

const SYSTEM_PROMPT =
  'You are an expert analyst of US tech stocks for swing trades held 4 days to 3 weeks. ' +
  'Answer with a single JSON object and nothing else.';

const recommendationSchema = z.object({
  symbol: z.string().optional(),
  action: z
    .string()
    .transform(v => v.trim().toUpperCase())
    .pipe(z.enum(['BUY', 'SELL', 'HOLD'])),
  confidence: z.coerce.number().min(0).max(1),
  target_price: z.number().positive().nullish(),
  stop_loss: z.number().positive().nullish(),
  reasoning: z.string().optional(),
});

const coerceJson = (text: string): string => {
  try {
    JSON.parse(text);
    return text;
  } catch {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');

    if (start !== -1 && end !== -1 && end > start) {
      return text.slice(start, end + 1);
    }

    throw new Error('No JSON object found in Grok response.');
  }
};

export function buildMessages(symbol: string, context: MarketContext): ChatMessage[] {
  const lines = [
    `Current time: ${dayjs(context.now).toISOString()}`,
    `Symbol: ${symbol}`,
    `Last price: ${context.price.toFixed(2)} USD`,
    `Account equity: ${context.equity.toFixed(2)} USD`,
  ];
  if (context.position) {
    const p = context.position;
    lines.push(
      `We hold ${p.quantity} shares bought at ${p.entryPrice.toFixed(2)}, ` +
        `stop ${p.stopLoss.toFixed(2)}, target ${p.takeProfit.toFixed(2)}, unrealized P&L ${p.unrealizedPnl.toFixed(2)}.`,
      'Decide whether to keep holding (HOLD) or exit now (SELL).'
    );
  } else {
    lines.push('We hold no shares. Decide whether to open a long swing position now (BUY) or wait (HOLD).');
  }
  lines.push(
    '',
    'Respond with JSON:',
    '{"symbol": string, "action": "BUY" | "SELL" | "HOLD", "confidence": number between 0 and 1, ' +
      '"target_price": number, "stop_loss": number, "reasoning": string}'
  );

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: lines.join('\n') },
  ];
}

export function parseRecommendation(symbol: string, text: string, timestamp: number): Recommendation {
  let raw: unknown;
  try {
    raw = JSON.parse(coerceJson(text.trim()));
  } catch (err) {
    throw new AnalysisUnavailable(symbol, `Unparseable Grok response for ${symbol}: ${describeError(err)}`, err);
  }

  const parsed = recommendationSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new AnalysisUnavailable(symbol, `Malformed Grok recommendation for ${symbol}: ${issues}`);
  }

  const data = parsed.data;
  if (data.symbol && data.symbol.trim().toUpperCase() !== symbol) {
    throw new AnalysisUnavailable(symbol, `Grok answered for ${data.symbol} instead of ${symbol}`);
  }

  return {
    symbol,
    action: data.action,
    confidence: data.confidence,
    ...(data.target_price != null ? { targetPrice: data.target_price } : {}),
    ...(data.stop_loss != null ? { stopLoss: data.stop_loss } : {}),
    ...(data.reasoning ? { reasoning: data.reasoning } : {}),
    timestamp,
  };
}

/** AnalysisGateway asking Grok for one recommendation per symbol. */
export class GrokAnalysisGateway implements AnalysisGateway {
  constructor(
    private readonly complete: ChatCompletionFn,
    private readonly log: BotLogger = silentLogger,
    private readonly now: () => number = Date.now
  ) {}

  async getRecommendation(symbol: string, context: MarketContext): Promise<Recommendation> {
    let text: string;
    try {
      text = await this.complete(buildMessages(symbol, context));
    } catch (err) {
      throw new AnalysisUnavailable(symbol, `Grok request for ${symbol} failed: ${describeError(err)}`, err);
    }
    if (!text.trim()) {
      throw new AnalysisUnavailable(symbol, `Empty Grok response for ${symbol}`);
    }

    const recommendation = parseRecommendation(symbol, text, this.now());
    this.log.debug(`${symbol}: ${recommendation.action} conf=${recommendation.confidence}`);
    return recommendation;
  }
}

export interface GrokOptions {
  apiKey: string;
  model?: string;
  baseURL?: string;
  timeoutMs: number;
}

export function createGrokCompletion(options: GrokOptions): ChatCompletionFn {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL ?? GROK_BASE_URL,
    timeout: options.timeoutMs,
    maxRetries: 1,
  });
  const model = options.model ?? DEFAULT_GROK_MODEL;

  return async messages => {
    const response = await client.chat.completions.create({
      model,
      messages,
      temperature: 0.3,
    });
    return response.choices[0]?.message.content ?? '';
  };
}
