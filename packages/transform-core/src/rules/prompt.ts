/**
 * Greeting prompt mapping
 */

import { asRecord, asString, isPlainObject } from '@callbridge/core';

export interface ProcessedPrompt {
  audio_prompt_id?: string;
  text_prompt?: string;
  mode: string;
}

/**
 * Source prompt (`audio.{uri,id}`, `text`, `mode`) to the target's prompt
 * fields. Mode defaults to `Audio`.
 */
export function processAudioPrompt(prompt: unknown): ProcessedPrompt | null {
  if (!isPlainObject(prompt)) return null;

  const processed: ProcessedPrompt = { mode: asString(prompt.mode) ?? 'Audio' };
  const audio = asRecord(prompt.audio);
  const audioId = asString(audio.uri) ?? asString(audio.id);
  if (audioId !== null) processed.audio_prompt_id = audioId;

  const text = asString(prompt.text);
  if (text !== null) processed.text_prompt = text;

  return processed;
}
