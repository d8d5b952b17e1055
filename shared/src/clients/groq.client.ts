/**
 * Travel-query extraction through Groq's OpenAI-compatible chat completions API.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { TravelQuery } from '../models/flight.model';
import { isoDay } from '../validators/flight.validator';
import { classifyError, fail, ok, ServiceResult } from './service-result';

export interface QueryExtractionClient {
  extract(text: string): Promise<ServiceResult<TravelQuery>>;
}

export interface GroqQueryClientOptions {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
  now?: () => Date;
}

export const DEFAULT_GROQ_URL = 'https://api.groq.com/openai/v1';
export const DEFAULT_GROQ_MODEL = 'llama3-70b-8192';

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .min(1)
});

const nullableText = z
  .string()
  .nullish()
  .transform((value) => value?.trim() || null);

const extractedQuerySchema = z.object({
  origin_city: z.string().nullish().transform((value) => value?.trim() ?? ''),
  destination_city: z.string().nullish().transform((value) => value?.trim() ?? ''),
  departure_date: nullableText,
  return_date: nullableText,
  passengers: z.coerce.number().int().min(1).nullish().transform((value) => value ?? 1),
  max_price: z.coerce.number().positive().nullish().transform((value) => value ?? null),
  trip_type: z.enum(['roundtrip', 'one-way']).nullish()
});

const FENCED_JSON = /```(?:json)?\s*([\s\S]*?)```/i;

/** Pulls the JSON object out of a model reply, tolerating code fences and chatter. */
export function extractJsonObject(content: string): unknown {
  const fenced = content.match(FENCED_JSON);
  const body = fenced ? fenced[1] : content;
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new SyntaxError('No JSON object in model reply');
  }
  return JSON.parse(body.slice(start, end + 1));
}

export class GroqQueryClient implements QueryExtractionClient {
  private readonly http: AxiosInstance;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly now: () => Date;

  constructor(options: GroqQueryClientOptions = {}) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_GROQ_MODEL;
    this.now = options.now ?? (() => new Date());
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? DEFAULT_GROQ_URL,
        timeout: options.timeoutMs ?? 30000
      });
  }

  get configured(): boolean {
    return Boolean(this.apiKey);
  }

  async extract(text: string): Promise<ServiceResult<TravelQuery>> {
    if (!this.apiKey) {
      return fail('auth', 'Groq API key is not configured (GROQ_API_KEY)');
    }

    try {
      const response = await this.http.post(
        '/chat/completions',
        {
          model: this.model,
          messages: [{ role: 'user', content: this.buildPrompt(text) }],
          temperature: 0.1,
          max_tokens: 500
        },
        { headers: { Authorization: `Bearer ${this.apiKey}`, 'Content-Type': 'application/json' } }
      );

      const completion = completionSchema.parse(response.data);
      let raw: unknown;
      try {
        raw = extractJsonObject(completion.choices[0].message.content);
      } catch (error) {
        return fail('invalid_response', `Model reply was not JSON: ${error instanceof Error ? error.message : String(error)}`);
      }

      const extracted = extractedQuerySchema.parse(raw);
      return ok({
        originPlace: extracted.origin_city,
        destinationPlace: extracted.destination_city,
        departureDate: extracted.departure_date,
        returnDate: extracted.return_date,
        passengers: extracted.passengers,
        maxPrice: extracted.max_price,
        tripType: extracted.trip_type ?? (extracted.return_date ? 'roundtrip' : 'one-way')
      });
    } catch (error) {
      return { ok: false, error: classifyError(error) };
    }
  }

  private buildPrompt(text: string): string {
    return [
      'Analyze this flight search query and extract the following information in JSON format:',
      `Query: "${text}"`,
      `Today is ${isoDay(this.now())}.`,
      '',
      'Extract:',
      '- origin_city: The departure city/location',
      '- destination_city: The arrival city/location',
      '- departure_date: Departure date (YYYY-MM-DD format)',
      '- return_date: Return date if roundtrip (YYYY-MM-DD format, null if one-way)',
      '- passengers: Number of passengers (default 1)',
      '- max_price: Maximum flight price in USD (null if not specified)',
      '- trip_type: "roundtrip" or "one-way"',
      '',
      'Return only valid JSON, no other text.'
    ].join('\n');
  }
}
