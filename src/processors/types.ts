import type { AssetKind, Transform } from "../contracts";

/**
 * Codec boundary. A processor turns the bytes of one asset into new bytes
 * for a single step, or throws ProcessorError. It never touches the
 * filesystem.
 */
export interface Processor {
  readonly kind: AssetKind;
  transform(input: Buffer, step: Transform): Promise<Buffer>;
}

export type ProcessorSet = Readonly<Record<AssetKind, Processor>>;
