import type { Readable } from 'stream';

/**
 * A local attachment that can be read ahead and rewound to byte 0.
 *
 * The classifier reads a header through `read`, which advances the cursor; the
 * upload then calls `rewind` and streams the whole content from `stream`.
 */
export interface IAttachmentSource {
  readonly name: string;
  readonly size: number;

  /**
   * Read into `buffer` from the cursor and advance it. Returns bytes read, 0 at EOF.
   */
  read(buffer: Buffer): Promise<number>;

  rewind(): Promise<void>;

  /**
   * Stream the remaining content, starting at the cursor
   */
  stream(): Readable;

  close(): Promise<void>;
}
