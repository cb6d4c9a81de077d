// Structured log lines would otherwise interleave with test output.
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}
