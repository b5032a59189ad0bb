import type { ScheduledPostStatus } from './types.js';

export class InvalidStatusTransitionError extends Error {
  constructor(public postId: string, public from: ScheduledPostStatus, public to: ScheduledPostStatus) {
    super(`Scheduled post ${postId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidStatusTransitionError';
  }
}

export class TimeSlotValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeSlotValidationError';
  }
}

export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}
