import { describe, it, expect, vi, afterEach } from 'vitest';
import { lightFetch } from '../../middleware/lightFetcher';
import {
  clearRateLimiters,
  clearRobotsCache,
  isAllowedByRobots,
  throttled,
} from '../../middleware/compliance';

vi.mock('../../middleware/lightFetcher', () => ({
  lightFetch: vi.fn(),
}));

const fetchMock = vi.mocked(lightFetch);

const ROBOTS = ['User-agent: *', 'Disallow: /private/', ''].join('\n');

describe('isAllowedByRobots', () => {
  afterEach(() => {
    clearRobotsCache();
    fetchMock.mockReset();
  });

  it('follows the host rules and caches them per host', async () => {
    fetchMock.mockResolvedValue({ body: ROBOTS, statusCode: 200, headers: {} });

    expect(await isAllowedByRobots('https://court.example.test/causelist', 'test-agent')).toBe(true);
    expect(await isAllowedByRobots('https://court.example.test/private/x', 'test-agent')).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith('https://court.example.test/robots.txt', { timeout: 5_000 });
  });

  it('allows everything when robots.txt is missing', async () => {
    fetchMock.mockResolvedValue({ body: 'Not Found', statusCode: 404, headers: {} });

    expect(await isAllowedByRobots('https://court.example.test/private/x', 'test-agent')).toBe(true);
  });

  it('allows everything when robots.txt is unreachable', async () => {
    fetchMock.mockRejectedValue(new Error('ECONNREFUSED'));

    expect(await isAllowedByRobots('https://court.example.test/private/x', 'test-agent')).toBe(true);
  });
});

describe('throttled', () => {
  afterEach(async () => {
    await clearRateLimiters();
  });

  it('runs tasks for one host one at a time', async () => {
    let running = 0;
    let peak = 0;
    const task = async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return 'done';
    };

    const results = await Promise.all([
      throttled('https://court.example.test/a', 0, task),
      throttled('https://court.example.test/b', 0, task),
    ]);

    expect(results).toEqual(['done', 'done']);
    expect(peak).toBe(1);
  });
});
