import { FixFragment, FixSnapshot } from "@core/types";

/**
 * Latest decoded fragment per sentence variant.
 *
 * Written by the stream reader, read by the sampler and the status page,
 * cleared by the stream reader whenever the device connection fails.
 */
export interface IFixStore {
  /**
   * Overwrite the slot matching the fragment's kind
   */
  update(fragment: FixFragment): void;

  /**
   * Copy of all five slots as of a single point in time
   */
  snapshot(): FixSnapshot;

  /**
   * Empty every slot, signalling "no current data"
   */
  clear(): void;
}
