/**
 * Latest-cycle-wins guard for the report artifact: a cycle may write only if
 * no newer cycle has written already.
 */
export class ReportGuard {
  private latest: number | null = null;

  get lastWrittenAt(): Date | null {
    return this.latest === null ? null : new Date(this.latest);
  }

  /** Claims the artifact for `asOf`; false when a newer cycle owns it. */
  claim(asOf: Date): boolean {
    const at = asOf.getTime();
    if (this.latest !== null && at < this.latest) return false;
    this.latest = at;
    return true;
  }
}
