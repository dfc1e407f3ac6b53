/**
 * Minimal API smoke test script
 * Run with: npm run smoke (requires API server running on port 8787)
 */

const API_BASE = process.env.API_BASE || 'http://localhost:8787';

interface TestResult {
  name: string;
  passed: boolean;
  error?: string;
}

const results: TestResult[] = [];

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
    results.push({ name, passed: true });
    console.log(`✓ ${name}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    results.push({ name, passed: false, error: message });
    console.log(`✗ ${name}: ${message}`);
  }
}

async function fetchJson(url: string, options?: RequestInit): Promise<unknown> {
  const response = await fetch(url, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options?.headers,
    },
  });
  return response.json();
}

async function runTests(): Promise<void> {
  console.log('\n=== API Smoke Tests ===\n');

  await test('GET /health returns ok:true', async () => {
    const result = await fetchJson(`${API_BASE}/health`) as { ok: boolean };
    if (!result.ok) throw new Error('Expected ok:true');
  });

  let sessionId: string | null = null;

  await test('POST /sessions creates a session', async () => {
    const result = await fetchJson(`${API_BASE}/sessions`, { method: 'POST' }) as { id?: string };
    if (!result.id) throw new Error(`Expected id, got: ${JSON.stringify(result)}`);
    sessionId = result.id;
  });

  await test('GET /sessions/:id/insights is empty before any transaction', async () => {
    const result = await fetchJson(`${API_BASE}/sessions/${sessionId}/insights`) as { status?: string };
    if (result.status !== 'empty') throw new Error(`Expected status 'empty', got '${result.status}'`);
  });

  await test('POST /sessions/:id/transactions appends transactions', async () => {
    for (const [amount, category] of [[50, 'Food'], [30, 'Food'], [20, 'Transportation']] as const) {
      const result = await fetchJson(`${API_BASE}/sessions/${sessionId}/transactions`, {
        method: 'POST',
        body: JSON.stringify({ amount, category, description: 'smoke-test' }),
      }) as { amount?: number };
      if (result.amount !== amount) throw new Error(`Expected amount ${amount}, got ${result.amount}`);
    }
  });

  await test('GET /sessions/:id/insights aggregates spending', async () => {
    const result = await fetchJson(`${API_BASE}/sessions/${sessionId}/insights`) as {
      total_spent?: number;
      largest_category?: string;
    };
    if (result.total_spent !== 100) throw new Error(`Expected total 100, got ${result.total_spent}`);
    if (result.largest_category !== 'Food') {
      throw new Error(`Expected largest 'Food', got '${result.largest_category}'`);
    }
  });

  await test('PUT /sessions/:id/budget then GET summary', async () => {
    await fetchJson(`${API_BASE}/sessions/${sessionId}/budget`, {
      method: 'PUT',
      body: JSON.stringify({ income: 2000, expenses: { Housing: 1000, Food: 400 } }),
    });
    const result = await fetchJson(`${API_BASE}/sessions/${sessionId}/summary`) as {
      savings_rate_percent?: number;
    };
    if (result.savings_rate_percent !== 30) {
      throw new Error(`Expected savings rate 30, got ${result.savings_rate_percent}`);
    }
  });

  await test('POST /sessions/:id/chat answers a question', async () => {
    const result = await fetchJson(`${API_BASE}/sessions/${sessionId}/chat`, {
      method: 'POST',
      body: JSON.stringify({ message: 'How do I get out of debt?' }),
    }) as { reply?: string };
    if (!result.reply?.startsWith('Managing debt')) {
      throw new Error(`Unexpected reply: ${result.reply}`);
    }
  });

  await test('POST negative amount is rejected', async () => {
    const response = await fetch(`${API_BASE}/sessions/${sessionId}/transactions`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ amount: -5, category: 'Food' }),
    });
    if (response.status !== 400) throw new Error(`Expected 400, got ${response.status}`);
  });

  await test('DELETE /sessions/:id removes the session', async () => {
    const response = await fetch(`${API_BASE}/sessions/${sessionId}`, { method: 'DELETE' });
    if (!response.ok) throw new Error(`HTTP ${response.status}`);
  });

  // Summary
  console.log('\n=== Summary ===');
  const passed = results.filter(r => r.passed).length;
  const failed = results.filter(r => !r.passed).length;
  console.log(`Passed: ${passed}, Failed: ${failed}`);

  if (failed > 0) {
    process.exit(1);
  }
}

// Check if API is reachable before running tests
async function checkApiReachable(): Promise<boolean> {
  try {
    const response = await fetch(`${API_BASE}/health`);
    return response.ok;
  } catch {
    return false;
  }
}

async function main(): Promise<void> {
  console.log('Checking if API server is running...');

  const reachable = await checkApiReachable();
  if (!reachable) {
    console.error(`\nError: API server not reachable at ${API_BASE}`);
    console.error('Please start the server with: npm start\n');
    process.exit(1);
  }

  await runTests();
}

main().catch((error: unknown) => {
  console.error('[Smoke] Unexpected failure:', error);
  process.exit(1);
});
