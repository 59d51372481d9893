/**
 * Sampler Notification Port
 *
 * Builds transaction traces from push/pop events. Only notified while
 * tracing is enabled.
 */

export interface Sampler {
  noticePushScope(startTime: number): void;
  noticePopScope(name: string, endTime: number): void;
}

/** Sampler used when the host registers none. */
export class NullSampler implements Sampler {
  noticePushScope(_startTime: number): void {}
  noticePopScope(_name: string, _endTime: number): void {}
}
