export { createApp, createScanRouter, startServer } from './server';
