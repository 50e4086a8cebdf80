// ---------------------------------------------------------------------------
// JSON file store: the whole library in one document on disk.
// ---------------------------------------------------------------------------

import fs from "node:fs/promises";
import path from "node:path";
import type pino from "pino";
import type { LibrarySnapshot } from "../core/types.js";
import { MalformedStoreDataError, PersistenceError } from "../core/errors.js";
import { decodeSnapshot, encodeSnapshot } from "./snapshot-codec.js";
import { emptySnapshot, type StateStore } from "./state-store.js";

/** Members file written next to a books file in the split layout. */
export const SPLIT_MEMBERS_FILE = "library_members.json";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Stores the library state as a single pretty-printed JSON document.
 *
 * Saves go to a temporary sibling file which is then renamed over the
 * target, so a crash mid-write leaves the previous document in place.
 */
export class JsonFileStateStore implements StateStore {
  readonly location: string;
  private readonly logger: pino.Logger;

  constructor(filePath: string, logger: pino.Logger) {
    this.location = path.resolve(filePath);
    this.logger = logger;
  }

  async load(): Promise<LibrarySnapshot> {
    let text: string;
    try {
      text = await fs.readFile(this.location, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.info({ file: this.location }, "no data file yet; starting with an empty library");
      } else {
        this.logger.warn(
          { file: this.location, err },
          "data file could not be read; starting with an empty library",
        );
      }
      return emptySnapshot();
    }

    if (text.trim() === "") {
      this.logger.info({ file: this.location }, "data file is empty; starting with an empty library");
      return emptySnapshot();
    }

    try {
      const parsed: unknown = JSON.parse(text);
      const members = Array.isArray(parsed) ? await this.readSplitMembers() : [];
      const { snapshot, repairs } = decodeSnapshot(parsed, members);
      if (repairs.length > 0) {
        this.logger.warn({ file: this.location, repairs }, "data file had inconsistencies; repaired on load");
      }
      this.logger.info(
        {
          file: this.location,
          books: snapshot.books.length,
          members: snapshot.members.length,
          history: snapshot.history.length,
        },
        "library state loaded",
      );
      return snapshot;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      const malformed = new MalformedStoreDataError(this.location, reason, { cause: err });
      this.logger.warn(
        { err: { name: malformed.name, message: malformed.message } },
        "data file is malformed; starting with an empty library",
      );
      return emptySnapshot();
    }
  }

  /**
   * A books-only array comes from the split layout, whose members live in a
   * sibling file. The next save writes both into the single document.
   */
  private async readSplitMembers(): Promise<unknown[]> {
    const membersPath = path.join(path.dirname(this.location), SPLIT_MEMBERS_FILE);
    let text: string;
    try {
      text = await fs.readFile(membersPath, "utf-8");
    } catch (err) {
      if (!isMissingFile(err)) {
        this.logger.warn({ file: membersPath, err }, "members file could not be read");
      }
      return [];
    }

    const parsed: unknown = text.trim() === "" ? [] : JSON.parse(text);
    if (!Array.isArray(parsed)) {
      throw new Error(`${membersPath} does not hold a list of members`);
    }
    this.logger.info({ file: membersPath }, "reading members from the split layout");
    return parsed;
  }

  async save(snapshot: LibrarySnapshot): Promise<void> {
    const body = JSON.stringify(encodeSnapshot(snapshot), null, 2) + "\n";
    const tmpPath = `${this.location}.${process.pid}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.location), { recursive: true });
      await fs.writeFile(tmpPath, body, "utf-8");
      await fs.rename(tmpPath, this.location);
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.debug({ file: tmpPath, err: cleanupErr }, "could not remove temporary file");
      });
      const reason = err instanceof Error ? err.message : String(err);
      throw new PersistenceError(this.location, reason, { cause: err });
    }
  }
}
