import { describe, it, expect } from 'vitest';
import {
  PROFILES,
  adviceFor,
  getFinancialAdvice,
  isQuickQuestionKind,
  matchTopic,
  resolveProfile,
} from '../advisor';

describe('matchTopic', () => {
  it('matches keywords case-insensitively', () => {
    expect(matchTopic('How should I BUDGET my pay?')).toBe('budget');
    expect(matchTopic('I want to save money')).toBe('savings');
    expect(matchTopic('Is my credit score ok?')).toBe('debt');
    expect(matchTopic('Building an emergency fund')).toBe('emergency');
  });

  it('applies rules in priority order', () => {
    expect(matchTopic('Should I budget or save?')).toBe('budget');
    expect(matchTopic('Tell me about retirement savings')).toBe('savings');
    expect(matchTopic('Invest or pay off my loan?')).toBe('investment');
  });

  it('returns null when nothing matches', () => {
    expect(matchTopic('What is the weather like?')).toBeNull();
  });
});

describe('adviceFor', () => {
  it('uses the persona entry when there is one', () => {
    expect(adviceFor('student', 'budget')).toMatch(/^Hey! As a student, budgeting is super important\./);
    expect(adviceFor('professional', 'retirement')).toMatch(/^Retirement planning should be a priority\./);
  });

  it('falls back to the entry shared by all personas', () => {
    expect(adviceFor('student', 'debt')).toMatch(/^Managing debt is crucial for financial health\./);
    expect(adviceFor('professional', 'emergency')).toMatch(/^An emergency fund is essential!/);
  });

  it('falls back to the generic line without any entry', () => {
    expect(adviceFor('professional', 'budget')).toBe("Based on your profile, here's some tailored advice about budget...");
  });

  it('treats unknown personas as young_adult', () => {
    expect(adviceFor('pirate', 'savings')).toBe("Based on your profile, here's some tailored advice about savings...");
    expect(resolveProfile('pirate')).toBe(PROFILES.young_adult);
  });
});

describe('getFinancialAdvice', () => {
  it('answers a matched query for the persona', () => {
    expect(getFinancialAdvice('Where should I start investing?', 'professional')).toMatch(
      /^As a professional, you should consider diversifying/,
    );
  });

  it('quotes the query back when no topic matches', () => {
    expect(getFinancialAdvice('What about taxes?', 'student')).toMatch(
      /^I understand you're asking about: 'What about taxes\?'\. While I'd love/,
    );
  });
});

describe('isQuickQuestionKind', () => {
  it('accepts the three quick questions', () => {
    expect(isQuickQuestionKind('budgeting')).toBe(true);
    expect(isQuickQuestionKind('investments')).toBe(true);
    expect(isQuickQuestionKind('debt')).toBe(false);
    expect(isQuickQuestionKind(3)).toBe(false);
  });
});
