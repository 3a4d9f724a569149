// Deterministic, unstyled output for every suite.
process.env.AGENT_CONSOLE_BORING = '1';
delete process.env.AGENT_CONSOLE_DEBUG;
delete process.env.AGENT_CONSOLE_TRACE;
