import type { Core } from '@strapi/strapi';

import { getCreativeWriterSettings, isModelProviderConfigured, isSearchConfigured } from './ai/creative/settings';
import { setEvaluationStore } from './ai/creative/evaluation/store';
import {
  EVALUATION_RECORD_UID,
  StrapiEvaluationStore,
} from './api/evaluation-record/services/strapi-evaluation-store';
import type { EvaluationRecordDocument, StrapiDocumentService } from './types/strapi';
import { bindLogSink } from './utils/logger';

/**
 * Extended HTTP request timeout for long-running operations.
 *
 * A creative writer run makes several model and search calls per agent and
 * can loop writer → editor a few times. Default Node.js timeouts are too short.
 */
const EXTENDED_REQUEST_TIMEOUT_MS = 15 * 60 * 1000; // 15 minutes

export default {
  /**
   * Routes the app's logger to Strapi's before anything logs.
   */
  register({ strapi }: { strapi: Core.Strapi }) {
    bindLogSink(strapi.log);
  },

  /**
   * Validates settings, wires the persistent evaluation store and extends
   * HTTP server timeouts for streamed runs.
   */
  async bootstrap({ strapi }: { strapi: Core.Strapi }) {
    // Throws SettingsError on malformed values so misconfiguration fails the boot
    const settings = getCreativeWriterSettings();
    if (!isModelProviderConfigured(settings)) {
      strapi.log.warn(
        'Creative writer is not configured: set OPENROUTER_API_KEY and EMBEDDING_API_KEY (or OPENAI_API_KEY)'
      );
    }
    if (!isSearchConfigured(settings)) {
      strapi.log.warn('TAVILY_API_KEY is not set: the researcher will find no web results');
    }

    // Strapi 5's document service has limited TypeScript support without generated types
    const documents = strapi.documents(EVALUATION_RECORD_UID) as unknown as StrapiDocumentService<EvaluationRecordDocument>;
    setEvaluationStore(new StrapiEvaluationStore(documents));

    // Without this, the server closes the connection before a long stream finishes.
    // See: https://nodejs.org/api/http.html#servertimeout
    const httpServer = strapi.server?.httpServer;
    if (httpServer) {
      // Disable socket inactivity timeout (0 = no timeout)
      httpServer.timeout = 0;
      httpServer.requestTimeout = EXTENDED_REQUEST_TIMEOUT_MS;
      httpServer.headersTimeout = EXTENDED_REQUEST_TIMEOUT_MS + 1000; // Must be > requestTimeout
      httpServer.keepAliveTimeout = EXTENDED_REQUEST_TIMEOUT_MS;

      strapi.log.info('HTTP server timeouts configured for long-running operations (timeout=disabled)');
    }
  },
};
