import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.util';

const termList = z.array(z.string().trim().min(1));

const vocabularySchema = z.object({
  quality: termList,
  source: termList,
  audio: termList,
  codec: termList,
  releaseGroups: termList,
  protectedMarkers: termList,
  caseSensitiveTerms: termList.default([]),
  noiseTerms: termList,
  languageCodes: termList,
  cjkNoisePhrases: termList,
  knownTitles: termList,
  commonWords: termList,
  editionSuffixes: termList,
  leadingArticles: termList,
  yearOverrides: z.array(
    z.object({
      allOf: termList.min(1),
      year: z.number().int().min(1900).max(2030),
    })
  ),
});

export type TechnicalVocabulary = z.infer<typeof vocabularySchema>;

export const DEFAULT_VOCABULARY_PATH = path.resolve(__dirname, '../../config/vocabulary.json');

export function parseVocabulary(raw: unknown): TechnicalVocabulary {
  const result = vocabularySchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid vocabulary: ${issues}`);
  }

  return result.data;
}

export function loadVocabulary(filePath: string = DEFAULT_VOCABULARY_PATH): TechnicalVocabulary {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read vocabulary file: ${filePath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigurationError(`Vocabulary file is not valid JSON: ${filePath}`, { cause: error });
  }

  const vocabulary = parseVocabulary(raw);
  console.log(
    `Vocabulary loaded: ${vocabulary.quality.length} quality, ${vocabulary.source.length} source, ` +
      `${vocabulary.releaseGroups.length} release groups, ${vocabulary.noiseTerms.length} noise terms`
  );
  return vocabulary;
}
