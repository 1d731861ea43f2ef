// Loggers resolve their level at import time; keep test output quiet
process.env.NODE_ENV = "test";
delete process.env.LOG_LEVEL;
