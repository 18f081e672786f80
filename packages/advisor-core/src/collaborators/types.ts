/**
 * Collaborator contracts consumed by the orchestrator
 */

import type { RunContext } from '../context';
import type { ConversationMessage } from '../messages';
import type { VegaLiteSpec } from '../visualization/types';
import type { Worker } from '../workers/types';

/**
 * Natural-language routing for a fresh query.
 * Returns a route word; anything unrecognized is treated as "finish".
 */
export interface IntentClassifier {
    classify(conversationText: string, context: RunContext): Promise<string>;
}

/**
 * Final narrative generation over the run's message history
 */
export interface Synthesizer {
    synthesize(messages: readonly ConversationMessage[], context: RunContext): Promise<string>;
}

/**
 * Optional chart-to-image rendering. Returns PNG bytes, or null when the
 * chart cannot be rendered.
 */
export interface Rasterizer {
    rasterize(chart: VegaLiteSpec, chartId: string): Promise<Uint8Array | null>;
}

export interface AdvisorCollaborators {
    classifier: IntentClassifier;
    synthesizer: Synthesizer;
    workers: readonly Worker[];
    rasterizer?: Rasterizer;
}
