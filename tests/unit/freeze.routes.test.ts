/**
 * Unit Tests for the freeze router
 *
 * Checks which middleware guards each freeze route.
 */

import { describe, it, expect } from '@jest/globals';
import router from '../../src/routes/freeze.routes';
import { versioningRateLimiter } from '../../src/middleware/rateLimiter.middleware';

interface RouteLayer {
  route?: {
    path: string;
    methods: Record<string, boolean>;
    stack: Array<{ handle: unknown }>;
  };
}

const handlersFor = (method: string, path: string): unknown[] => {
  const layers: RouteLayer[] = router.stack;
  const layer = layers.find(entry => entry.route?.path === path && entry.route.methods[method]);
  return layer?.route ? layer.route.stack.map(entry => entry.handle) : [];
};

describe('Freeze routes', () => {
  it('should limit freezing with the versioning limiter', () => {
    expect(handlersFor('post', '/')).toContain(versioningRateLimiter);
  });

  it('should limit rollback with the versioning limiter', () => {
    expect(handlersFor('post', '/:freezeId/rollback')).toContain(versioningRateLimiter);
  });

  it('should not apply it to diffs', () => {
    const handlers = handlersFor('get', '/diff');
    expect(handlers.length).toBeGreaterThan(0);
    expect(handlers).not.toContain(versioningRateLimiter);
  });
});
