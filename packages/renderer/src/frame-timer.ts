/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { FRAME_CONSTANTS } from './constants.js';

/**
 * Rolling average of frame times, reported at a fixed interval once the
 * window has filled.
 */
export class FrameTimer {
  private samples: number[] = [];
  private next = 0;
  private lastReport: number | null = null;

  constructor(
    private readonly onReport: (averageMs: number) => void,
    private readonly windowSize: number = FRAME_CONSTANTS.WINDOW_SIZE,
    private readonly intervalMs: number = FRAME_CONSTANTS.REPORT_INTERVAL_MS
  ) {}

  /**
   * Record one frame's duration, observed at time `now` (ms)
   */
  record(durationMs: number, now: number): void {
    if (this.samples.length < this.windowSize) {
      this.samples.push(durationMs);
    } else {
      this.samples[this.next] = durationMs;
    }
    this.next = (this.next + 1) % this.windowSize;

    if (this.lastReport === null) {
      this.lastReport = now;
      return;
    }
    if (now - this.lastReport < this.intervalMs) return;

    const average = this.average();
    if (average === null) return;
    this.lastReport = now;
    this.onReport(average);
  }

  /** Mean of the window, or null until it is full */
  average(): number | null {
    if (this.samples.length < this.windowSize) return null;
    return this.samples.reduce((sum, v) => sum + v, 0) / this.samples.length;
  }

  reset(): void {
    this.samples = [];
    this.next = 0;
    this.lastReport = null;
  }
}
