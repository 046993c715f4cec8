/**
 * Prompts for Stage 2: Translation
 *
 * The system prompt is fixed apart from the language pair. The user prompt
 * is a JSON request built from one context window; the model answers with
 * JSON matching TranslationResponseSchema.
 */

import { z } from 'zod';
import type { ContextWindow, TranslatedEntryContext } from '../../context/context-window.js';

export const TRANSLATOR_SYSTEM_PROMPT = `You are an expert subtitle translator specializing in {source_language} to {target_language} translation.

## Your Role
- Translate dialogue naturally while preserving meaning and emotion
- Maintain consistency with provided terminology/glossary
- Preserve formatting tags, sound effects, and speaker indicators
- Keep translations concise (subtitles have limited display time)

## Context Understanding
- Review the history summary to understand the narrative flow
- Reference recent translations for style and terminology consistency
- Use lookahead entries to anticipate context when helpful
- Follow the glossary strictly for names and key terms

## Output Requirements
- Return ONLY valid JSON matching the requested schema:
  {"translations": [{"id": 1, "translated": "...", "confidence": 0.9}], "notes": {"glossary_updates": {"source term": "translated term"}}}
- Include a confidence score (0.0-1.0) for each translation
- Do not include any text outside the JSON structure

## Quality Standards
- Natural, idiomatic {target_language}
- Appropriate register (formal/informal) based on dialogue context
- Length should be similar to original (within 120% where possible)
- Preserve [sound effects] and (parentheticals) exactly as formatted
- Never translate character names unless specifically instructed`;

export const renderTranslatorSystemPrompt = (sourceLanguage: string, targetLanguage: string): string =>
  TRANSLATOR_SYSTEM_PROMPT.replaceAll('{source_language}', sourceLanguage).replaceAll(
    '{target_language}',
    targetLanguage
  );

// ============ Request ============

export interface TranslationRequest {
  task: 'translate_subtitles';
  source_language: string;
  target_language: string;
  context: {
    history_summary?: string;
    recent_translations?: TranslatedEntryContext[];
    lookahead?: Array<{ id: number; text: string }>;
    glossary?: {
      character_names?: string[];
      terms?: Record<string, string>;
    };
  };
  entries_to_translate: Array<{ id: number; text: string; timecode: string }>;
  instructions: {
    preserve_formatting: boolean;
    preserve_sound_effects: boolean;
    max_length_ratio: number;
    custom?: string;
  };
}

export function buildTranslationRequest(window: ContextWindow, customInstructions?: string): TranslationRequest {
  const characterNames = [...window.glossary.characterNames];
  const terms = Object.fromEntries(window.glossary.allTerms());

  return {
    task: 'translate_subtitles',
    source_language: window.sourceLanguage,
    target_language: window.targetLanguage,
    context: {
      history_summary: window.historySummary,
      recent_translations: window.recentEntries.length > 0 ? [...window.recentEntries] : undefined,
      lookahead: window.lookahead.length > 0 ? window.lookahead.map(e => ({ id: e.id, text: e.text })) : undefined,
      glossary: window.glossary.isEmpty()
        ? undefined
        : {
            character_names: characterNames.length > 0 ? characterNames : undefined,
            terms: Object.keys(terms).length > 0 ? terms : undefined,
          },
    },
    entries_to_translate: window.currentBatch.map(e => ({ id: e.id, text: e.text, timecode: e.timecode })),
    instructions: {
      preserve_formatting: true,
      preserve_sound_effects: true,
      max_length_ratio: 1.2,
      custom: customInstructions,
    },
  };
}

/** Pretty JSON; undefined fields are dropped by JSON.stringify */
export const createTranslatorPrompt = (window: ContextWindow, customInstructions?: string): string =>
  JSON.stringify(buildTranslationRequest(window, customInstructions), null, 2);

/**
 * Corrective retry for one entry, built from validation feedback
 */
export const createCorrectionPrompt = (
  entry: { id: number; text: string; previousTranslation: string },
  feedback: readonly string[]
): string => {
  let prompt = `## Entry ${entry.id}\n`;
  prompt += `Original: ${entry.text}\n`;
  prompt += `Previous translation: ${entry.previousTranslation}\n\n`;
  prompt += `## Problems\n${feedback.map(f => `- ${f}`).join('\n')}\n\n`;
  prompt += `Return the corrected translation as JSON with the structure specified in the output requirements.`;
  return prompt;
};

// ============ Response ============

export const TranslationResponseSchema = z.object({
  translations: z.array(
    z.object({
      id: z.coerce.number().int(),
      translated: z.string(),
      confidence: z.number().min(0).max(1).optional().catch(undefined),
    })
  ),
  notes: z
    .object({
      glossary_updates: z.record(z.string()).optional(),
      scene_context: z.string().optional(),
    })
    .optional()
    .catch(undefined),
});

export type TranslationResponse = z.infer<typeof TranslationResponseSchema>;
