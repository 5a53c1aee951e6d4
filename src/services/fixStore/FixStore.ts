import { IFixStore } from "@core/interfaces";
import {
  FixFragment,
  FixSnapshot,
  GGAFragment,
  GSAFragment,
  GSVFragment,
  RMCFragment,
  VTGFragment,
} from "@core/types";
import { assertNever } from "@utils/typeGuards";
import { getLogger } from "@utils/logger";

const logger = getLogger("FixStore");

type Slots = {
  rmc: RMCFragment | null;
  gga: GGAFragment | null;
  gsa: GSAFragment | null;
  gsv: GSVFragment | null;
  vtg: VTGFragment | null;
};

const emptySlots = (): Slots => ({
  rmc: null,
  gga: null,
  gsa: null,
  gsv: null,
  vtg: null,
});

/**
 * Fix Store
 *
 * Holds the latest decoded fragment of each sentence variant. One instance
 * is created at startup and handed to the stream reader, the sampler and
 * the status page.
 *
 * Each operation is a synchronous method that copies references only, so
 * it runs to completion on the event loop before any other task can touch
 * the store: a snapshot never sees half of an update or a clear. Fragments
 * are frozen on update and shared between snapshots without copying.
 */
export class FixStore implements IFixStore {
  private slots: Slots = emptySlots();
  private updatedAt: Date | null = null;

  /**
   * Overwrite the slot matching the fragment's kind (last write wins)
   */
  update(fragment: FixFragment): void {
    Object.freeze(fragment);
    switch (fragment.kind) {
      case "RMC":
        this.slots.rmc = fragment;
        break;
      case "GGA":
        this.slots.gga = fragment;
        break;
      case "GSA":
        this.slots.gsa = fragment;
        break;
      case "GSV":
        this.slots.gsv = fragment;
        break;
      case "VTG":
        this.slots.vtg = fragment;
        break;
      default:
        assertNever(fragment, "fix fragment");
    }
    this.updatedAt = new Date();
  }

  snapshot(): FixSnapshot {
    return Object.freeze({
      ...this.slots,
      updatedAt: this.updatedAt ? new Date(this.updatedAt) : null,
    });
  }

  clear(): void {
    this.slots = emptySlots();
    this.updatedAt = null;
    logger.debug("Fix store cleared");
  }
}
