/**
 * The interactive session. `suspend` stops the session's own event
 * processing while `work` runs and restarts it afterwards.
 */
export interface Session {
  suspend<T>(work: () => Promise<T>): Promise<T>;
}

export const passthroughSession: Session = {
  suspend: <T>(work: () => Promise<T>) => work(),
};
