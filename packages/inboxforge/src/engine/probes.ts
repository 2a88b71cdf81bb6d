import type { BrowserSession } from '../browser/types.js';
import type { FieldProbe } from '../detection/selectors.js';
import type { InteractionResult } from './interactions.js';

export interface ProbeOutcome<P extends FieldProbe> {
  /** The probe whose action succeeded, if any */
  matched: P | null;
  /** Probes that were visible but whose action failed */
  failed: P[];
  /** Whether any probe was visible at all */
  found: boolean;
}

/**
 * Try probes in priority order. A probe is acted on only when its element
 * is visible; the first successful action wins. A failed action falls
 * through to the next candidate.
 */
export async function runProbes<P extends FieldProbe>(
  session: BrowserSession,
  probes: readonly P[],
  act: (probe: P) => Promise<InteractionResult>,
): Promise<ProbeOutcome<P>> {
  const failed: P[] = [];
  let found = false;

  for (const probe of probes) {
    let visible: boolean;
    try {
      visible = await session.isVisible(probe.selector);
    } catch {
      // Invalid selector for this engine or page mid-navigation; try the next one
      visible = false;
    }
    if (!visible) continue;

    found = true;
    const result = await act(probe);
    if (result.ok) {
      return { matched: probe, failed, found };
    }
    failed.push(probe);
  }

  return { matched: null, failed, found };
}
