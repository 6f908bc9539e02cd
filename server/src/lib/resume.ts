import { readFile } from 'node:fs/promises';
import logger from './logger.js';

export const RESUME_NOT_AVAILABLE = 'Resume not available.';
export const RESUME_LOAD_ERROR = 'Error loading resume.';

/**
 * Reads the resume once at start-up. A missing or unreadable file yields a
 * placeholder so the Q&A surface still answers.
 */
export async function loadResume(resumePath: string): Promise<{ text: string; loaded: boolean }> {
  try {
    const text = await readFile(resumePath, 'utf-8');
    logger.info({ resumePath, chars: text.length }, 'Resume loaded');
    return { text, loaded: true };
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      logger.error({ resumePath }, 'Resume file not found');
      return { text: RESUME_NOT_AVAILABLE, loaded: false };
    }
    logger.error({ resumePath, error: err instanceof Error ? err.message : String(err) }, 'Error loading resume');
    return { text: RESUME_LOAD_ERROR, loaded: false };
  }
}
