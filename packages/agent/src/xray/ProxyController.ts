export interface ValidationOutcome {
  valid: boolean;
  /** Output of the proxy's test facility, kept for error reports. */
  output: string;
}

export interface ProcessProbe {
  running: boolean;
  /** The local management interface answered a query. */
  managementReachable: boolean;
  detail?: string;
}

/**
 * The three opaque operations the agent needs from the proxy: test a
 * candidate document, reload in place, and read liveness/counters from the
 * management interface. Injected so the reconciler and monitors can run
 * against a fake.
 */
export interface ProxyController {
  validate(candidatePath: string): Promise<ValidationOutcome>;
  reload(candidatePath: string): Promise<void>;
  probe(): Promise<ProcessProbe>;
  queryStats(): Promise<Record<string, number>>;
}
