/**
 * Queries the report needs from a tuner. Discovery, tuning and the device
 * control protocol itself live behind this seam.
 *
 * Each method resolves to the variable's text, or null when the tuner has
 * nothing to report for it.
 */
export interface TunerClient {
  /** Tuner status line: ch=, lock=, ss=, snq=, seq=, bps=, pps= */
  getStatus(): Promise<string | null>;
  getStreamInfo(): Promise<string | null>;
  /** ATSC 3.0 PLP list with its bsid= line */
  getPlpInfo(): Promise<string | null>;
  /** Firmware version string, e.g. "20250815" */
  getFirmwareVersion(): Promise<string | null>;
  /** Base64 L1 signaling from /tuner<n>/l1detail */
  getL1Detail(tunerIndex: number): Promise<string | null>;
}
