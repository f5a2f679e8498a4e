// Keep test output to failures only
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
