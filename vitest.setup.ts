// Keep log lines out of test output unless a test asks for them with its own level and
// destination.
process.env.LOG_LEVEL ??= "silent";
