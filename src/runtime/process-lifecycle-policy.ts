/**
 * Whether fatal-signal handlers may touch the real process.
 * Test runs own the process lifecycle, so they get an in-memory signal table instead.
 */
export type ProcessLifecyclePolicy =
  | { kind: 'install_signal_handlers' }
  | { kind: 'no_signal_handlers' };
