/**
 * Rule-based financial advisor.
 * Topics: budget, savings, investment, debt, retirement, emergency
 *
 * Queries are matched by plain substring search against keyword lists;
 * answers come from a static (persona, topic) table.
 */

export const PROFILE_TYPES = ['student', 'young_adult', 'professional'] as const;

export type ProfileType = (typeof PROFILE_TYPES)[number];

export const DEFAULT_PROFILE: ProfileType = 'young_adult';

export interface Profile {
  tone: string;
  complexity: 'simple' | 'moderate' | 'detailed';
  focus: string[];
}

export const PROFILES: Record<ProfileType, Profile> = {
  student: {
    tone: 'casual and encouraging',
    complexity: 'simple',
    focus: ['budgeting', 'savings', 'student_loans', 'part_time_income'],
  },
  young_adult: {
    tone: 'friendly and motivational',
    complexity: 'moderate',
    focus: ['emergency_fund', 'debt_management', 'first_home', 'career_building'],
  },
  professional: {
    tone: 'formal and analytical',
    complexity: 'detailed',
    focus: ['investments', 'retirement', 'tax_optimization', 'career_growth'],
  },
};

export function isProfileType(value: unknown): value is ProfileType {
  return typeof value === 'string' && PROFILE_TYPES.some((item) => item === value);
}

/** Unknown profile types fall back to the default persona */
export function resolveProfile(profileType: string): Profile {
  return PROFILES[isProfileType(profileType) ? profileType : DEFAULT_PROFILE];
}

export const TIP_TOPICS = ['budgeting', 'savings', 'investments', 'debt'] as const;

export type TipTopic = (typeof TIP_TOPICS)[number];

export const TIPS: Record<TipTopic, readonly string[]> = {
  budgeting: [
    'Follow the 50/30/20 rule: 50% needs, 30% wants, 20% savings',
    'Track every expense for at least a month to understand spending patterns',
    'Use budgeting apps or spreadsheets to monitor your finances',
    'Review and adjust your budget monthly',
  ],
  savings: [
    'Pay yourself first - save before spending',
    'Automate your savings to make it effortless',
    'Build an emergency fund of 3-6 months of expenses',
    'Take advantage of high-yield savings accounts',
  ],
  investments: [
    'Start investing early to benefit from compound interest',
    'Diversify your portfolio across different asset classes',
    'Consider low-cost index funds for beginners',
    "Don't try to time the market - invest consistently",
  ],
  debt: [
    'Pay more than the minimum on high-interest debt',
    'Consider the debt avalanche or snowball method',
    'Avoid taking on new debt while paying off existing debt',
    'Look into debt consolidation if it lowers your interest rate',
  ],
};

export function isTipTopic(value: unknown): value is TipTopic {
  return typeof value === 'string' && TIP_TOPICS.some((item) => item === value);
}

export type Topic = 'budget' | 'savings' | 'investment' | 'debt' | 'retirement' | 'emergency';

interface TopicRule {
  topic: Topic;
  keywords: string[];
}

/**
 * Topic rules (priority order - first match wins)
 */
const TOPIC_RULES: TopicRule[] = [
  { topic: 'budget', keywords: ['budget', 'budgeting'] },
  { topic: 'savings', keywords: ['save', 'saving', 'savings'] },
  { topic: 'investment', keywords: ['invest', 'investment', 'investing'] },
  { topic: 'debt', keywords: ['debt', 'loan', 'credit'] },
  { topic: 'retirement', keywords: ['retirement'] },
  { topic: 'emergency', keywords: ['emergency', 'emergency fund'] },
];

/** Persona-specific entries win over '*' entries for the same topic */
type AdviceKey = `${ProfileType | '*'}:${Topic}`;

const ADVICE: Partial<Record<AdviceKey, string>> = {
  'student:budget':
    "Hey! As a student, budgeting is super important. Start simple: track your income (from jobs, parents, financial aid) and your expenses. Try the envelope method - allocate money for essentials like food, textbooks, and rent first, then see what's left for fun stuff!",
  'student:savings':
    'Even saving small amounts as a student makes a huge difference! Try to save 10% of any income you get. Look for student discounts everywhere, buy used textbooks, and consider cooking instead of eating out. Every dollar counts!',
  'professional:investment':
    "As a professional, you should consider diversifying your investment portfolio. Focus on tax-advantaged accounts like 401(k) and IRA first. Consider low-cost index funds, and if your employer offers 401(k) matching, contribute at least enough to get the full match - it's free money.",
  'professional:retirement':
    "Retirement planning should be a priority. Aim to save 10-15% of your income for retirement. Max out your 401(k) contributions if possible, especially if you're in a high tax bracket. Consider Roth IRA for tax diversification in retirement.",
  '*:debt':
    'Managing debt is crucial for financial health. Focus on paying off high-interest debt first, make more than minimum payments when possible, and avoid taking on new debt. Consider debt consolidation if it reduces your interest rate.',
  '*:emergency':
    'An emergency fund is essential! Aim to save 3-6 months of living expenses in a high-yield savings account. Start small - even $500 can help with minor emergencies. Automate transfers to build this fund gradually.',
};

/**
 * Match a free-text query to a topic.
 * Returns null if no keyword occurs in the query.
 */
export function matchTopic(query: string): Topic | null {
  const text = query.toLowerCase();
  for (const rule of TOPIC_RULES) {
    if (rule.keywords.some((keyword) => text.includes(keyword))) {
      return rule.topic;
    }
  }
  return null;
}

/**
 * Advice for a (persona, topic) pair.
 * Lookup order: persona entry, then the '*' entry, then a generic line.
 */
export function adviceFor(profileType: string, topic: Topic): string {
  const persona = isProfileType(profileType) ? profileType : DEFAULT_PROFILE;
  return (
    ADVICE[`${persona}:${topic}`] ??
    ADVICE[`*:${topic}`] ??
    `Based on your profile, here's some tailored advice about ${topic}...`
  );
}

export function getFinancialAdvice(query: string, profileType: string): string {
  const topic = matchTopic(query);
  if (topic) return adviceFor(profileType, topic);

  return `I understand you're asking about: '${query}'. While I'd love to provide more specific advice, here are some general financial principles that apply to most situations: spend less than you earn, save consistently, invest for the long term, and always have an emergency fund. Could you be more specific about what financial topic you'd like help with?`;
}

export interface QuickQuestion {
  prompt: string;
  intro: string;
  topic: TipTopic;
}

export const QUICK_QUESTION_KINDS = ['budgeting', 'savings', 'investments'] as const;

export type QuickQuestionKind = (typeof QUICK_QUESTION_KINDS)[number];

/** One-tap questions answered with a tip list */
export const QUICK_QUESTIONS: Record<QuickQuestionKind, QuickQuestion> = {
  budgeting: {
    prompt: 'Give me budgeting tips',
    intro: 'Here are some budgeting tips:',
    topic: 'budgeting',
  },
  savings: {
    prompt: 'How can I save more money?',
    intro: 'Here are some saving strategies:',
    topic: 'savings',
  },
  investments: {
    prompt: 'Tell me about investing',
    intro: "Here's some investment advice:",
    topic: 'investments',
  },
};

export function isQuickQuestionKind(value: unknown): value is QuickQuestionKind {
  return typeof value === 'string' && QUICK_QUESTION_KINDS.some((item) => item === value);
}
