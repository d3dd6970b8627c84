import { skipReason } from '../trigger';

describe('skipReason', () => {
  it('runs for pushes to the configured branch', () => {
    expect(skipReason({ eventName: 'push', ref: 'refs/heads/main' }, 'main')).toBeNull();
  });

  it('skips other events', () => {
    expect(skipReason({ eventName: 'pull_request', ref: 'refs/pull/12/merge' }, 'main')).toBe(
      "Event 'pull_request' is not a push, skipping"
    );
  });

  it('skips pushes to other branches and tags', () => {
    expect(skipReason({ eventName: 'push', ref: 'refs/heads/feature' }, 'main')).toBe(
      "Push to 'refs/heads/feature' is not on main, skipping"
    );
    expect(skipReason({ eventName: 'push', ref: 'refs/tags/main' }, 'main')).not.toBeNull();
  });

  it('honours a custom branch', () => {
    expect(skipReason({ eventName: 'push', ref: 'refs/heads/develop' }, 'develop')).toBeNull();
  });
});
