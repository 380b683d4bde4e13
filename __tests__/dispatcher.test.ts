import { probeAll } from '../lib/dispatcher';
import { probeHost } from '../lib/prober';
import type { CheckOutcome, HostProbeOutcome, ProbeResult } from '../lib/types';

function result(host: string, path = '/'): ProbeResult {
  const url = `https://${host}${path}`;
  return {
    url,
    statusCode: 200,
    finalUrl: url,
    title: host,
    contentLength: 10,
    server: 'Unknown',
    contentType: 'text/html',
    discoveredAt: '2025-01-02T03:04:05.000Z',
    domain: host,
  };
}

function outcome(host: string, results: ProbeResult[] = [result(host)]): HostProbeOutcome {
  return { host, results, attempts: results.length, failures: [] };
}

const wait = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe('probeAll', () => {
  test('returns results for every host', async () => {
    const hosts = ['a.example.cu', 'b.example.cu', 'c.example.cu'];

    const report = await probeAll(hosts, { concurrency: 2, probe: async (h) => outcome(h) });

    expect(new Set(report.results.map((r) => r.domain))).toEqual(new Set(hosts));
    expect(new Set(report.outcomes.map((o) => o.host))).toEqual(new Set(hosts));
    expect(report.errors).toEqual([]);
  });

  test('isolates a failing host from the others', async () => {
    const hosts = ['a.example.cu', 'bad.example.cu', 'c.example.cu'];
    const probe = async (h: string) => {
      if (h === 'bad.example.cu') throw new Error('parser exploded');
      await wait(5);
      return outcome(h);
    };

    const report = await probeAll(hosts, { concurrency: 3, probe });

    expect(report.results.map((r) => r.domain).sort()).toEqual(['a.example.cu', 'c.example.cu']);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0].host).toBe('bad.example.cu');
    expect(report.errors[0].error.message).toBe('parser exploded');
  });

  test('accounts for every host as an outcome or an error', async () => {
    const hosts = Array.from({ length: 12 }, (_, i) => `h${i}.example.cu`);
    const probe = async (h: string) => {
      if (h.startsWith('h3') || h.startsWith('h7')) throw new Error(`failed ${h}`);
      return outcome(h, h.startsWith('h1') ? [] : [result(h)]);
    };

    const report = await probeAll(hosts, { concurrency: 4, probe });

    expect(report.outcomes.length + report.errors.length).toBe(hosts.length);
    expect(new Set([...report.outcomes.map((o) => o.host), ...report.errors.map((e) => e.host)])).toEqual(new Set(hosts));
  });

  test('keeps at most `concurrency` hosts in flight', async () => {
    let active = 0;
    let maxActive = 0;
    const probe = async (h: string) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await wait(5);
      active--;
      return outcome(h);
    };

    const hosts = Array.from({ length: 10 }, (_, i) => `h${i}.example.cu`);
    await probeAll(hosts, { concurrency: 3, probe });

    expect(maxActive).toBe(3);
  });

  test('merges outcomes in completion order', async () => {
    const delays: Record<string, number> = { 'slow.example.cu': 40, 'fast.example.cu': 1 };
    const probe = async (h: string) => {
      await wait(delays[h]);
      return outcome(h);
    };
    const done: string[] = [];

    const report = await probeAll(['slow.example.cu', 'fast.example.cu'], {
      concurrency: 2,
      probe,
      onHostDone: (o) => done.push(o.host),
    });

    expect(report.outcomes.map((o) => o.host)).toEqual(['fast.example.cu', 'slow.example.cu']);
    expect(done).toEqual(['fast.example.cu', 'slow.example.cu']);
  });

  test('a throwing onHostDone callback does not fail the run', async () => {
    const report = await probeAll(['a.example.cu', 'b.example.cu'], {
      concurrency: 2,
      probe: async (h) => outcome(h),
      onHostDone: (o) => {
        if (o.host === 'a.example.cu') throw new Error('callback failed');
      },
    });

    expect(report.outcomes.map((o) => o.host).sort()).toEqual(['a.example.cu', 'b.example.cu']);
    expect(report.results).toHaveLength(2);
    expect(report.errors).toEqual([]);
  });

  test('an unreachable host yields an empty outcome, not an error', async () => {
    const check = async (url: string): Promise<CheckOutcome> => ({
      kind: 'failure', url, reason: 'dns', message: 'getaddrinfo ENOTFOUND',
    });

    const report = await probeAll(['gone.example.cu'], {
      probe: (h) => probeHost(h, { paths: ['/', '/admin'], check, sleep: async () => undefined }),
    });

    expect(report.errors).toEqual([]);
    expect(report.outcomes).toHaveLength(1);
    expect(report.outcomes[0].results).toEqual([]);
    expect(report.results).toEqual([]);
  });

  test('records a host whose URL cannot be built as a per-host error', async () => {
    const check = async (url: string): Promise<CheckOutcome> => ({ kind: 'result', result: result(new URL(url).host) });

    const report = await probeAll(['bad host.example.cu', 'a.example.cu'], {
      probe: (h) => probeHost(h, { paths: ['/'], check, sleep: async () => undefined }),
    });

    expect(report.results.map((r) => r.domain)).toEqual(['a.example.cu']);
    expect(report.errors.map((e) => e.host)).toEqual(['bad host.example.cu']);
    expect(report.errors[0].error.message).toMatch(/Invalid URL/);
  });
});
