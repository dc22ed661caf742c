/**
 * Standalone entry point for running the API under plain Node.
 * Firebase Admin picks up credentials from GOOGLE_APPLICATION_CREDENTIALS.
 */

import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import { createApp } from './app';
import { appConfig } from './config';
import { initSentry } from './utils/sentry';

const DEFAULT_PORT = 8080;

initSentry();
admin.initializeApp();

const port = Number.parseInt(process.env.PORT ?? '', 10) || DEFAULT_PORT;

createApp().listen(port, () => {
  functions.logger.info(`[server] ${appConfig.name} ${appConfig.version} listening on port ${port}`);
});
