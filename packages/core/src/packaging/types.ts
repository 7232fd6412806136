/**
 * @fileoverview Packaging strategy types
 */

/** Direct: labeled message blocks. Guided: content wrapped in fixed instructions. */
export type PackagingMode = 'direct' | 'guided';

export const PACKAGING_MODES: readonly PackagingMode[] = ['direct', 'guided'];

export function isPackagingMode(value: string): value is PackagingMode {
  return (PACKAGING_MODES as readonly string[]).includes(value);
}

export interface GuidedInput {
  /** Material the model should analyze */
  coreContent: string;
  /** What the model should do with it */
  directive: string;
}
