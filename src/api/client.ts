import type { ExpenseMap } from '../domain/types';
import type { Profile, ProfileType, QuickQuestionKind, TipTopic } from './advisor';
import type { ChatMessage } from './session';
import type {
  ApiCharts,
  ApiChatTurn,
  ApiEmpty,
  ApiInsights,
  ApiSession,
  ApiSummary,
  ApiTransaction,
} from './wire';

let apiBase = '/api';

export function setApiBase(base: string): void {
  apiBase = base.replace(/\/+$/, '');
}

export interface TransactionInput {
  amount: number;
  category: string;
  description?: string;
  date?: string;             // YYYY-MM-DD, defaults to today on the server
}

async function request<T>(path: string, failure: string, init?: RequestInit): Promise<T> {
  const response = await fetch(`${apiBase}${path}`, {
    ...init,
    headers: {
      'Content-Type': 'application/json',
      ...init?.headers,
    },
  });
  if (!response.ok) {
    const body: unknown = await response.json().catch(() => null);
    const detail = typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string'
      ? `: ${body.error}`
      : '';
    throw new Error(`${failure} (HTTP ${response.status})${detail}`);
  }
  return response.json();
}

// --- Reference data ---

export async function getProfiles(): Promise<Record<ProfileType, Profile>> {
  return request('/profiles', 'Failed to fetch profiles');
}

export async function getCategories(): Promise<string[]> {
  return request('/categories', 'Failed to fetch categories');
}

export async function getTips(topic: TipTopic): Promise<{ topic: TipTopic; tips: string[] }> {
  return request(`/tips/${topic}`, 'Failed to fetch tips');
}

// --- Sessions ---

export async function createSession(): Promise<ApiSession> {
  return request('/sessions', 'Failed to create session', { method: 'POST' });
}

export async function getSession(id: string): Promise<ApiSession> {
  return request(`/sessions/${id}`, 'Failed to fetch session');
}

export async function deleteSession(id: string): Promise<void> {
  await request(`/sessions/${id}`, 'Failed to delete session', { method: 'DELETE' });
}

export async function updateProfile(id: string, profileType: ProfileType): Promise<ApiSession> {
  return request(`/sessions/${id}/profile`, 'Failed to update profile', {
    method: 'PUT',
    body: JSON.stringify({ profile_type: profileType }),
  });
}

export async function updateBudget(id: string, income: number, expenses: ExpenseMap): Promise<ApiSession> {
  return request(`/sessions/${id}/budget`, 'Failed to update budget', {
    method: 'PUT',
    body: JSON.stringify({ income, expenses }),
  });
}

// --- Transactions ---

export async function getTransactions(id: string): Promise<ApiTransaction[]> {
  return request(`/sessions/${id}/transactions`, 'Failed to fetch transactions');
}

export async function createTransaction(id: string, data: TransactionInput): Promise<ApiTransaction> {
  return request(`/sessions/${id}/transactions`, 'Failed to create transaction', {
    method: 'POST',
    body: JSON.stringify(data),
  });
}

// --- Derived views ---

export async function getInsights(id: string): Promise<ApiInsights | ApiEmpty> {
  return request(`/sessions/${id}/insights`, 'Failed to fetch insights');
}

export async function getSummary(id: string): Promise<ApiSummary | ApiEmpty> {
  return request(`/sessions/${id}/summary`, 'Failed to fetch summary');
}

export async function getCharts(id: string): Promise<ApiCharts> {
  return request(`/sessions/${id}/charts`, 'Failed to fetch charts');
}

// --- Chat ---

export async function getMessages(id: string): Promise<ChatMessage[]> {
  return request(`/sessions/${id}/messages`, 'Failed to fetch messages');
}

export async function clearMessages(id: string): Promise<void> {
  await request(`/sessions/${id}/messages`, 'Failed to clear messages', { method: 'DELETE' });
}

export async function sendMessage(id: string, message: string): Promise<ApiChatTurn> {
  return request(`/sessions/${id}/chat`, 'Failed to send message', {
    method: 'POST',
    body: JSON.stringify({ message }),
  });
}

export async function askQuickQuestion(id: string, topic: QuickQuestionKind): Promise<ApiChatTurn> {
  return request(`/sessions/${id}/chat/quick`, 'Failed to ask quick question', {
    method: 'POST',
    body: JSON.stringify({ topic }),
  });
}
