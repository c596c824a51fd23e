// src/services/responseShapes.ts
// What: Decoder for the JSON bodies local generation servers send back.
// How: Each known shape is a zod schema that extracts the completion text. Shapes are tried in a fixed order and
//      the first one whose text field is present and non-empty wins. A body matching none of them is a
//      ResponseShapeError listing the top-level keys that were seen.

import { z } from 'zod';
import { ResponseShapeError } from '../errors.js';

export type ResponseShape = 'chat_completion' | 'text_completion' | 'native_chat' | 'content' | 'response';

export interface DecodedResponse {
  shape: ResponseShape;
  text: string;
}

const text = z.string().min(1);

interface ShapeVariant {
  shape: ResponseShape;
  schema: z.ZodType<string, z.ZodTypeDef, unknown>;
}

const VARIANTS: ShapeVariant[] = [
  {
    // OpenAI-compatible chat: { choices: [{ message: { content } }] }
    shape: 'chat_completion',
    schema: z
      .object({ choices: z.tuple([z.object({ message: z.object({ content: text }) })]).rest(z.unknown()) })
      .transform((d) => d.choices[0].message.content),
  },
  {
    // OpenAI-compatible legacy completion: { choices: [{ text }] }
    shape: 'text_completion',
    schema: z
      .object({ choices: z.tuple([z.object({ text })]).rest(z.unknown()) })
      .transform((d) => d.choices[0].text),
  },
  {
    // Ollama /api/chat
    shape: 'native_chat',
    schema: z.object({ message: z.object({ content: text }) }).transform((d) => d.message.content),
  },
  {
    shape: 'content',
    schema: z.object({ content: text }).transform((d) => d.content),
  },
  {
    // Ollama /api/generate
    shape: 'response',
    schema: z.object({ response: text }).transform((d) => d.response),
  },
];

export function decodeResponse(data: unknown): DecodedResponse {
  for (const variant of VARIANTS) {
    const parsed = variant.schema.safeParse(data);
    if (parsed.success) {
      return { shape: variant.shape, text: parsed.data };
    }
  }
  const keys = typeof data === 'object' && data !== null && !Array.isArray(data) ? Object.keys(data) : [];
  throw new ResponseShapeError(
    `Unrecognised generation response shape (keys: ${keys.length > 0 ? keys.join(', ') : 'none'})`,
    keys,
  );
}
