import { onRequest } from 'firebase-functions/v2/https';
import * as admin from 'firebase-admin';
import { createApp } from './app';
import { initSentry } from './utils/sentry';

// Initialize Sentry BEFORE other initializations
initSentry();

// Initialize Firebase Admin
admin.initializeApp();

// Export the API (v2)
export const api = onRequest(
  {
    timeoutSeconds: 60,
    memory: '512MiB',
    maxInstances: 100,
  },
  createApp()
);
