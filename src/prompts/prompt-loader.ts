import { readdirSync, readFileSync, statSync } from 'fs';
import path from 'path';
import YAML from 'yaml';
import { PROMPT_META_SCHEMA, type PromptFile, type PromptMeta } from '../schemas/prompt-schemas';
import type { Attribute } from '../corroboration/types';
import { ConfigError, handleUnknownError } from '../errors/index';
import { hasTemplateVariables } from './template-renderer';

export type { PromptFile, PromptMeta } from '../schemas/prompt-schemas';

export function loadPromptFile(fullPath: string): { prompt: PromptFile | undefined; warning?: string } {
  const filename = path.basename(fullPath);
  try {
    const raw = readFileSync(fullPath, 'utf-8');
    if (!raw.startsWith('---')) {
      return { prompt: undefined, warning: `Skipping ${filename}: missing frontmatter` };
    }
    const end = raw.indexOf('\n---', 3);
    if (end === -1) {
      return { prompt: undefined, warning: `Skipping ${filename}: unterminated frontmatter` };
    }

    let meta: PromptMeta;
    try {
      const rawData: unknown = YAML.parse(raw.slice(3, end).trim()) ?? {};
      meta = PROMPT_META_SCHEMA.parse(rawData);
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Prompt frontmatter');
      return { prompt: undefined, warning: `Skipping ${filename}: invalid YAML frontmatter (${err.message})` };
    }

    const body = raw.slice(end + 4).replace(/^\s*\n/, '');
    if (!body.trim()) {
      return { prompt: undefined, warning: `Skipping ${filename}: empty prompt body` };
    }
    if (!hasTemplateVariables(meta.query)) {
      return { prompt: undefined, warning: `Skipping ${filename}: query must reference {{person_name}}` };
    }

    return {
      prompt: {
        id: meta.id,
        filename,
        fullPath,
        meta,
        body,
      },
    };
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading prompt');
    return { prompt: undefined, warning: `Skipping ${filename}: cannot read file (${err.message})` };
  }
}

export function loadPrompts(dir: string): { prompts: PromptFile[]; warnings: string[] } {
  const warnings: string[] = [];
  let entries: string[];
  try {
    entries = readdirSync(dir).sort();
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading prompts directory');
    throw new ConfigError(`Failed to read prompts directory: ${err.message}`);
  }

  const prompts: PromptFile[] = [];
  for (const entry of entries) {
    if (!entry.toLowerCase().endsWith('.md')) continue;
    const full = path.resolve(dir, entry);
    if (!statSync(full).isFile()) continue;

    const result = loadPromptFile(full);
    if (result.warning) warnings.push(result.warning);
    if (result.prompt) prompts.push(result.prompt);
  }
  return { prompts, warnings };
}

/*
 * The prompt for one attribute. Exactly one prompt per attribute may exist.
 */
export function findPromptForAttribute(prompts: PromptFile[], attribute: Attribute): PromptFile {
  const matching = prompts.filter((p) => p.meta.attribute === attribute);
  const [prompt] = matching;
  if (!prompt) {
    throw new ConfigError(`No extraction prompt found for attribute '${attribute}'`);
  }
  if (matching.length > 1) {
    throw new ConfigError(
      `Several extraction prompts target '${attribute}': ${matching.map((p) => p.filename).join(', ')}`
    );
  }
  return prompt;
}
