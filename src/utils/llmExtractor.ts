/**
 * LLM structured extraction.
 *
 * Sends the user's message to the model with a system prompt that describes
 * the four reply types and the Zabbix bitmask tables, then parses the JSON
 * reply into an `AssistantReply`.  Output that is not valid JSON, or does not
 * match any reply type, becomes a `clarification_needed` reply.
 */

import { z } from 'zod';
import { stripNulls } from '../middleware/maintenanceValidation.js';
import { occurrenceSelectorFromNames } from './bitmask.js';
import { toLocalDateString } from './date.js';
import type { LLMClient } from './llmProvider.js';

/* ------------------------------------------------------------------ */
/*  Reply schemas                                                     */
/* ------------------------------------------------------------------ */

const wireRecurrenceConfigSchema = z.object({
  start_time: z.unknown(),
  duration: z.unknown(),
  every: z.unknown(),
  dayofweek: z.unknown(),
  day: z.unknown(),
  month: z.unknown(),
});

const maintenanceRequestSchema = z.object({
  type: z.literal('maintenance_request'),
  hosts: z.array(z.string()).default([]),
  groups: z.array(z.string()).default([]),
  trigger_tags: z
    .array(
      z.object({
        tag: z.string(),
        value: z.string().optional(),
        operator: z.number().int().optional(),
      }),
    )
    .default([]),
  start_time: z.string(),
  end_time: z.string(),
  description: z.string().optional(),
  recurrence_type: z.string().default('once'),
  recurrence_config: wireRecurrenceConfigSchema.optional(),
  ticket_number: z.string().optional(),
  confidence: z.number().min(0).max(100).optional(),
  message: z.string().default(''),
});

const helpRequestSchema = z.object({
  type: z.literal('help_request'),
  message: z.string(),
  examples: z.array(z.object({ title: z.string(), example: z.string() })).default([]),
});

const offTopicSchema = z.object({
  type: z.literal('off_topic'),
  message: z.string(),
});

const clarificationSchema = z.object({
  type: z.literal('clarification_needed'),
  message: z.string(),
  missing_info: z.array(z.string()).default([]),
  /** Validation failure code when the service, not the model, asked. */
  reason: z.string().optional(),
});

const assistantReplySchema = z.discriminatedUnion('type', [
  maintenanceRequestSchema,
  helpRequestSchema,
  offTopicSchema,
  clarificationSchema,
]);

export type MaintenanceRequestReply = z.infer<typeof maintenanceRequestSchema>;
type ClarificationReply = z.infer<typeof clarificationSchema>;
export type AssistantReply = z.infer<typeof assistantReplySchema>;

/* ------------------------------------------------------------------ */
/*  Prompt                                                            */
/* ------------------------------------------------------------------ */

export function buildSystemPrompt(now: Date): string {
  const today = toLocalDateString(now);
  const tomorrow = toLocalDateString(
    new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1),
  );

  const secondAndFourth = occurrenceSelectorFromNames(['second', 'fourth']);
  const firstThirdLast = occurrenceSelectorFromNames(['first', 'third', 'last']);
  const allOccurrences = occurrenceSelectorFromNames(['first', 'second', 'third', 'fourth', 'last']);

  return `You are an assistant that helps Zabbix operators create maintenance periods.

TODAY: ${today}
TOMORROW: ${tomorrow}

Servers may be called hosts, CIs, configuration items, nodes, instances,
appliances, routers or switches. Treat all of them as host names.

Classify the user's message and answer with ONLY one JSON object, no markdown:

1. A maintenance request:
{
  "type": "maintenance_request",
  "hosts": ["host1"],
  "groups": ["group1"],
  "trigger_tags": [{"tag": "component", "value": "cpu"}],
  "start_time": "YYYY-MM-DD HH:MM",
  "end_time": "YYYY-MM-DD HH:MM",
  "description": "short description",
  "recurrence_type": "once" | "daily" | "weekly" | "monthly",
  "recurrence_config": { ... only when recurrence_type is not "once" ... },
  "ticket_number": "ticket id if one is mentioned",
  "confidence": 0-100,
  "message": "friendly confirmation for the user"
}
For routine maintenance, start_time/end_time bound the period in which the
routine is active.

recurrence_config fields (all times in seconds):
- daily:   {"start_time": seconds since midnight, "duration": seconds, "every": N days}
- weekly:  {"start_time": ..., "duration": ..., "dayofweek": day mask, "every": N weeks}
- monthly by day:     {"start_time": ..., "duration": ..., "day": 1-31, "every": N months, "month": month mask}
- monthly by weekday: {"start_time": ..., "duration": ..., "dayofweek": day mask, "every": week occurrence, "month": month mask}
Use either "day" or "dayofweek" for monthly, never both.

Day mask (sum the values): Monday 1, Tuesday 2, Wednesday 4, Thursday 8,
Friday 16, Saturday 32, Sunday 64. Weekdays = 31, weekend = 96, every day = 127.

Month mask (sum the values): January 1, February 2, March 4, April 8, May 16,
June 32, July 64, August 128, September 256, October 512, November 1024,
December 2048. All months = 4095.

Week occurrence for monthly by weekday: first 1, second 2, third 3, fourth 4, last 5.
For several occurrences add the values: second and fourth = ${secondAndFourth},
first, third and last = ${firstThirdLast}, every occurrence = ${allOccurrences}.

Examples:
- "daily backup from 2 to 4 AM" -> daily, {"start_time": 7200, "duration": 7200, "every": 1}
- "every Monday 2-5 AM" -> weekly, {"start_time": 7200, "duration": 10800, "dayofweek": 1, "every": 1}
- "first Sunday of every month at 1 AM for 2 hours" -> monthly,
  {"start_time": 3600, "duration": 7200, "dayofweek": 64, "every": 1, "month": 4095}
- "second and fourth Monday of each quarter, 22:00 for 3 hours" -> monthly,
  {"start_time": 79200, "duration": 10800, "dayofweek": 1, "every": ${secondAndFourth}, "month": 585}
- "tomorrow 8 to 10" -> once, start_time "${tomorrow} 08:00", end_time "${tomorrow} 10:00"

2. A request for help or examples:
{"type": "help_request", "message": "...", "examples": [{"title": "...", "example": "..."}]}

3. Anything unrelated to creating maintenance:
{"type": "off_topic", "message": "explain that you only create maintenance periods"}

4. A maintenance request with missing details (hosts or groups, date, time window):
{"type": "clarification_needed", "message": "what is missing", "missing_info": ["hosts_or_groups", "timing"]}`;
}

/* ------------------------------------------------------------------ */
/*  Parsing                                                           */
/* ------------------------------------------------------------------ */

const FALLBACK_REPLY: ClarificationReply = {
  type: 'clarification_needed',
  message:
    "I couldn't work out what you need. Tell me which hosts or groups, the date and the time window, " +
    'for example: "Maintenance for srv-web01 tomorrow from 8 to 10".',
  missing_info: [],
};

/**
 * Pull the JSON object out of a model answer: the body of a ```json fence
 * when there is one, otherwise the span from the first "{" to the last "}".
 * Returns undefined when nothing parses.
 */
export function extractJsonObject(raw: string): unknown {
  const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/);
  let candidate = fenced ? fenced[1].trim() : raw;

  if (!fenced) {
    const start = raw.indexOf('{');
    const end = raw.lastIndexOf('}');
    if (start === -1 || end <= start) return undefined;
    candidate = raw.slice(start, end + 1);
  }

  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

export function parseAssistantReply(raw: string): AssistantReply {
  const json = extractJsonObject(raw);
  if (json === undefined) return { ...FALLBACK_REPLY };

  const parsed = assistantReplySchema.safeParse(stripNulls(json));
  return parsed.success ? parsed.data : { ...FALLBACK_REPLY };
}

/* ------------------------------------------------------------------ */
/*  Main extraction function                                          */
/* ------------------------------------------------------------------ */

/**
 * Interpret a chat message.  Provider failures propagate as
 * LLMUnavailableError; only malformed model output is absorbed here.
 */
export async function interpretMessage(
  llm: LLMClient,
  message: string,
  now: Date = new Date(),
): Promise<AssistantReply> {
  const raw = await llm.complete({
    messages: [
      { role: 'system', content: buildSystemPrompt(now) },
      { role: 'user', content: message },
    ],
    maxTokens: 1200,
    temperature: 0.2,
    jsonMode: true,
    logPrefix: 'Chat:Extract',
  });
  return parseAssistantReply(raw);
}
