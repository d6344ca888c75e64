import { BlockLookup } from '../store/partnerStore';

/**
 * Climbers who must never be shown to `viewerId`: everyone the viewer
 * blocked plus everyone who blocked the viewer.
 *
 * Applied before candidates are scored, never as a post-filter on results.
 */
export async function computeExclusionSet(blocks: BlockLookup, viewerId: string): Promise<Set<string>> {
  const excluded = new Set<string>();

  for (const block of await blocks.listBlocksInvolving(viewerId)) {
    if (block.blockerId === viewerId) {
      excluded.add(block.blockedId);
    } else if (block.blockedId === viewerId) {
      excluded.add(block.blockerId);
    }
  }
  return excluded;
}
