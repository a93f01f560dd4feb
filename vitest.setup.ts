process.env.NODE_ENV = 'test';

// Keep test output readable; individual tests build their own Logger when they assert on output.
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}

// Never pick up a developer's config file while testing.
delete process.env.SWEEPER_CONFIG;

export {};
