import pino from 'pino';

// Jest sets JEST_WORKER_ID; keep test output clean unless LOG_LEVEL asks otherwise.
const level = process.env.LOG_LEVEL || (process.env.JEST_WORKER_ID ? 'silent' : 'info');

const logger = pino({ name: 'host-recon', level });

export default logger;
