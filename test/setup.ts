// Jest setup file for global test configuration

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
delete process.env.LLM_SERVER_URL;
delete process.env.LLM_API_KEY;

export {};
