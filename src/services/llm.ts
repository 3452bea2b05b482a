import OpenAI from 'openai';
import type { LlmSettings, TextService } from '../types';

/**
 * Text-in/text-out client for any OpenAI-compatible gateway. Calls are
 * single-shot: retries are disabled so a failure surfaces to the caller.
 */
export function createTextService(settings: LlmSettings): TextService {
  const client = new OpenAI({
    apiKey: settings.apiKey,
    maxRetries: 0,
    ...(settings.baseURL ? { baseURL: settings.baseURL } : {})
  });
  return {
    async complete(prompt, content, signal) {
      const completion = await client.chat.completions.create(
        {
          model: prompt.model || settings.defaultModel,
          messages: [
            { role: 'system', content: prompt.text },
            { role: 'user', content }
          ]
        },
        { signal }
      );
      return completion.choices[0]?.message?.content ?? '';
    }
  };
}
