/**
 * Pre-release identifier attached to a version, e.g. `rc.2` in `1.4.0-rc.2`.
 */
export interface Prerelease {
  /** Alphanumeric label such as `alpha`, `beta` or `rc` */
  readonly label: string;
  /** Optional counter following the label, `null` when the label stands alone (`1.4.0-rc`) */
  readonly counter: number | null;
}
