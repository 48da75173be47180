/**
 * Prompts sent by the orchestrator.
 *
 * Generation and checking send the (sanitized) prompt or code as-is; only
 * fixing and feature injection wrap their input.
 */

import { getFixPrompt } from './fix';
import { getFeaturePrompt } from './feature';

export { getFixPrompt, getFeaturePrompt };
