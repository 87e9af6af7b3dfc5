import type { HarvestHandlers } from '../../types.js';
import { writeLink, writeSkip, writeTargetStart } from '../../util/output.js';

export function createDefaultHandlers(): HarvestHandlers {
  return {
    onTargetStart: (target: string) => writeTargetStart(target),
    onLink: (link: string) => writeLink(link),
    onSkip: (event) => writeSkip(event),
  };
}
