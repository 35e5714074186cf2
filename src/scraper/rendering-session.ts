import { logger } from '../utils/logger.js';

/**
 * A stateful rendering session (one browser tab). It can only be at one URL at a time.
 */
export interface RenderingSession {
  navigate(url: string): Promise<void>;
  /** Full markup of the currently loaded page, after client-side rendering */
  currentMarkup(): Promise<string>;
  close(): Promise<void>;
}

export type RenderingSessionFactory = () => Promise<RenderingSession>;

/**
 * Acquire a session for the duration of `fn` and always release it afterwards
 */
export async function withRenderingSession<T>(
  factory: RenderingSessionFactory,
  fn: (session: RenderingSession) => Promise<T>
): Promise<T> {
  const session = await factory();

  try {
    return await fn(session);
  } finally {
    try {
      await session.close();
    } catch (error) {
      logger.warn('Failed to close rendering session', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
