import type { SkillVocabulary } from '@domain/types/skills.js';
import { canonicalSkill, findSkillsInText, mergeSkills } from './skill-matching.js';

const vocabulary: SkillVocabulary = {
  skills: [
    { name: 'React', category: 'frontend', aliases: ['ReactJS'] },
    { name: 'Java', category: 'backend', aliases: [] },
    { name: 'JavaScript', category: 'frontend', aliases: ['JS'] },
    { name: 'C++', category: 'systems', aliases: ['cpp'] },
    { name: 'Node.js', category: 'backend', aliases: ['Node'] },
  ],
  upskillingWeeks: { beginner: 4, intermediate: 2 },
};

describe('canonicalSkill', () => {
  it('resolves names and aliases case-insensitively', () => {
    expect(canonicalSkill('react', vocabulary)).toBe('React');
    expect(canonicalSkill('REACTJS', vocabulary)).toBe('React');
    expect(canonicalSkill(' cpp ', vocabulary)).toBe('C++');
  });

  it('returns undefined for unknown or blank names', () => {
    expect(canonicalSkill('Cobol', vocabulary)).toBeUndefined();
    expect(canonicalSkill('  ', vocabulary)).toBeUndefined();
  });
});

describe('findSkillsInText', () => {
  it('finds the skills mentioned in a question', () => {
    expect(findSkillsInText('What skills do we need for a React project?', vocabulary)).toEqual(['React']);
  });

  it('orders by first mention', () => {
    expect(findSkillsInText('node services with a react front end', vocabulary)).toEqual(['Node.js', 'React']);
  });

  it('does not match a skill inside a longer word', () => {
    expect(findSkillsInText('We write JavaScript daily', vocabulary)).toEqual(['JavaScript']);
  });

  it('matches terms containing symbols', () => {
    expect(findSkillsInText('Legacy C++ and Node code', vocabulary)).toEqual(['C++', 'Node.js']);
  });

  it('returns an empty list when nothing matches', () => {
    expect(findSkillsInText('How is the team doing?', vocabulary)).toEqual([]);
  });
});

describe('mergeSkills', () => {
  it('canonicalises, de-duplicates and drops unknown names', () => {
    expect(mergeSkills(vocabulary, ['reactjs', 'Cobol'], ['React', 'js'])).toEqual(['React', 'JavaScript']);
  });
});
