/**
 * Social Publishing
 *
 * One publisher per supported platform: LinkedIn and Threads.
 */

import type { Logger } from '../../core/types.js';
import { LinkedInPublisher, type LinkedInAppConfig } from './linkedin.js';
import { ThreadsPublisher } from './threads.js';
import type { PublisherRegistry } from './types.js';

export function createPublishers(options: { linkedin: LinkedInAppConfig; logger?: Logger }): PublisherRegistry {
  return {
    linkedin: new LinkedInPublisher(options.linkedin, options.logger),
    threads: new ThreadsPublisher(options.logger),
  };
}

export { LinkedInPublisher, ThreadsPublisher };
export { CredentialManager, isTokenExpired, type ConnectionStatus, type CredentialProvider, type CredentialResult } from './credentials.js';
export type { PlatformCredential, PlatformPublisher, PublishInput, PublishOutcome, PublisherRegistry } from './types.js';
