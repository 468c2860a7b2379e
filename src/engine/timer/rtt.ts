/**
 * Round-trip time estimator.
 *
 * @module engine/timer/rtt
 * @see https://tools.ietf.org/html/rfc6298
 */

export interface RttParameters {
  /** Gain for the smoothed RTT */
  alpha: number;

  /** Gain for the RTT variance */
  beta: number;

  /** Variance multiplier in the timeout formula */
  k: number;

  initialTimeout: number;
  minTimeout: number;
  maxTimeout: number;
}

const defaultParameters: RttParameters = {
  alpha: 1 / 8,
  beta: 1 / 4,
  k: 4,
  initialTimeout: 1000,
  minTimeout: 200,
  maxTimeout: 60000,
};

/**
 * Smoothed RTT / RTT variance estimator producing a retransmission timeout.
 */
export class RttEstimator {
  private readonly params: RttParameters;
  private srtt: number | undefined;
  private rttvar: number | undefined;
  private rto_: number;

  constructor(opts: Partial<RttParameters> = {}) {
    this.params = { ...defaultParameters, ...opts };
    this.rto_ = this.clamp(this.params.initialTimeout);
  }

  get smoothedRtt(): number | undefined {
    return this.srtt;
  }

  get rttVariance(): number | undefined {
    return this.rttvar;
  }

  /** Current retransmission timeout, including any backoff */
  get rto(): number {
    return this.rto_;
  }

  /**
   * Feed a round-trip sample. Replaces any backed-off timeout.
   */
  push(sample: number): void {
    if (this.srtt === undefined || this.rttvar === undefined) {
      this.srtt = sample;
      this.rttvar = sample / 2;
    } else {
      const { alpha, beta } = this.params;
      this.rttvar = (1 - beta) * this.rttvar + beta * Math.abs(this.srtt - sample);
      this.srtt = (1 - alpha) * this.srtt + alpha * sample;
    }
    this.rto_ = this.clamp(this.srtt + this.params.k * this.rttvar);
  }

  /**
   * Double the timeout, up to the maximum.
   *
   * @returns The new timeout
   */
  backoff(): number {
    this.rto_ = this.clamp(this.rto_ * 2);
    return this.rto_;
  }

  private clamp(rto: number): number {
    return Math.max(this.params.minTimeout, Math.min(rto, this.params.maxTimeout));
  }
}
