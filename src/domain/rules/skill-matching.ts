import type { SkillVocabulary } from '@domain/types/skills.js';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Case-insensitive whole-term matcher; terms may contain symbols (C++, Node.js). */
function termPattern(term: string): RegExp {
  return new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(term)}(?![A-Za-z0-9])`, 'i');
}

/**
 * Canonical skill name for a name or alias, ignoring case.
 */
export function canonicalSkill(name: string, vocabulary: SkillVocabulary): string | undefined {
  const needle = name.trim().toLowerCase();
  if (!needle) return undefined;
  for (const skill of vocabulary.skills) {
    if (skill.name.toLowerCase() === needle) return skill.name;
    if (skill.aliases.some((alias) => alias.toLowerCase() === needle)) return skill.name;
  }
  return undefined;
}

/**
 * Vocabulary skills mentioned in free text, by canonical name, in order of
 * first mention.
 */
export function findSkillsInText(text: string, vocabulary: SkillVocabulary): string[] {
  const hits: Array<{ name: string; position: number }> = [];

  for (const skill of vocabulary.skills) {
    let best = -1;
    for (const term of [skill.name, ...skill.aliases]) {
      const match = termPattern(term).exec(text);
      if (match && (best === -1 || match.index < best)) {
        best = match.index;
      }
    }
    if (best !== -1) hits.push({ name: skill.name, position: best });
  }

  return hits.sort((a, b) => a.position - b.position).map((h) => h.name);
}

/**
 * Merge skill names from several sources into canonical, de-duplicated form.
 * Names outside the vocabulary are dropped.
 */
export function mergeSkills(vocabulary: SkillVocabulary, ...sources: ReadonlyArray<readonly string[]>): string[] {
  const merged: string[] = [];
  for (const source of sources) {
    for (const name of source) {
      const canonical = canonicalSkill(name, vocabulary);
      if (canonical && !merged.includes(canonical)) merged.push(canonical);
    }
  }
  return merged;
}
