// Runs before every test file, ahead of the first getConfig() call.
process.env.NODE_ENV = "test";
process.env.LOG_LEVEL ??= "SILENT";
