/** Catalog metadata is unreadable or inconsistent; needs an operator. */
export class CatalogCorruptError extends Error {
  readonly name = "CatalogCorruptError" as const;
  constructor(
    message: string,
    readonly entryId: string | null = null,
  ) {
    super(entryId ? `Catalog corrupt at ${entryId}: ${message}` : `Catalog corrupt: ${message}`);
  }
}

/** Thrown when an entry id is already present in the catalog or on disk. */
export class DuplicateIdError extends Error {
  readonly name = "DuplicateIdError" as const;
  constructor(readonly entryId: string) {
    super(`Backup entry already exists: ${entryId}`);
  }
}

/** Thrown when an operation targets an entry id that does not exist. */
export class EntryNotFoundError extends Error {
  readonly name = "EntryNotFoundError" as const;
  constructor(readonly entryId: string) {
    super(`Backup entry not found: ${entryId}`);
  }
}
