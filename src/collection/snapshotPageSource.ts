/**
 * SnapshotPageSource: replay a captured listing from a JSON file
 *
 * Lets the collection stage run offline against pages captured earlier.
 * The file is read on the first page-count request; a missing or malformed
 * file surfaces as an unusable listing.
 */

import { readFileSync } from "fs";
import type {
  FieldName,
  ListingSnapshot,
  ListingSnapshotItem,
  PageSource,
  RawPosting,
} from "@/types";
import { FIELD_ORDER } from "@/constants";

export class SnapshotFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SnapshotFormatError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFieldName(key: string): key is FieldName {
  return FIELD_ORDER.some((field) => field === key);
}

function parseItem(value: unknown, location: string): ListingSnapshotItem | null {
  if (value === null) {
    return null;
  }
  if (!isRecord(value)) {
    throw new SnapshotFormatError(`${location}: item must be an object or null`);
  }

  const item: ListingSnapshotItem = {};
  for (const [key, fieldValue] of Object.entries(value)) {
    if (!isFieldName(key)) {
      throw new SnapshotFormatError(`${location}: unknown field "${key}"`);
    }
    if (fieldValue !== null && typeof fieldValue !== "string") {
      throw new SnapshotFormatError(`${location}.${key}: must be a string or null`);
    }
    item[key] = typeof fieldValue === "string" ? fieldValue : null;
  }
  return item;
}

/**
 * Validate parsed JSON as a listing snapshot
 *
 * @throws {SnapshotFormatError} When the structure does not match
 */
export function parseListingSnapshot(data: unknown): ListingSnapshot {
  if (!isRecord(data)) {
    throw new SnapshotFormatError("snapshot must be an object");
  }
  const rawPages: unknown = data.pages;
  if (!Array.isArray(rawPages) || rawPages.length === 0) {
    throw new SnapshotFormatError("snapshot.pages must be a non-empty array");
  }
  const capturedAt = data.capturedAt;
  if (capturedAt !== undefined && typeof capturedAt !== "string") {
    throw new SnapshotFormatError("snapshot.capturedAt must be a string");
  }

  const pageList: unknown[] = rawPages;
  const pages = pageList.map((page, pageIndex) => {
    if (!Array.isArray(page)) {
      throw new SnapshotFormatError(`pages[${pageIndex}] must be an array`);
    }
    const items: unknown[] = page;
    return items.map((item, itemIndex) =>
      parseItem(item, `pages[${pageIndex}][${itemIndex}]`),
    );
  });

  return { capturedAt: typeof capturedAt === "string" ? capturedAt : undefined, pages };
}

export class SnapshotPageSource implements PageSource {
  private snapshot: ListingSnapshot | null = null;
  private pageIndex = 0;

  constructor(private readonly snapshotPath: string) {}

  private load(): ListingSnapshot {
    if (!this.snapshot) {
      const data: unknown = JSON.parse(readFileSync(this.snapshotPath, "utf-8"));
      this.snapshot = parseListingSnapshot(data);
    }
    return this.snapshot;
  }

  private currentPage(): Array<ListingSnapshotItem | null> {
    return this.load().pages[this.pageIndex] ?? [];
  }

  async getTotalPageCount(): Promise<number> {
    return this.load().pages.length;
  }

  async getItemCountOnCurrentPage(): Promise<number> {
    return this.currentPage().length;
  }

  async extractItem(index: number): Promise<RawPosting | null> {
    const item = this.currentPage()[index];
    if (!item) {
      return null;
    }

    return {
      postingId: item.postingId ?? null,
      institution: item.institution ?? null,
      jobTitle: item.jobTitle ?? null,
      postingStartDate: item.postingStartDate ?? null,
      postingEndDate: item.postingEndDate ?? null,
      monthlySalary: item.monthlySalary ?? null,
      vacancyCount: item.vacancyCount ?? null,
      contractCode: item.contractCode ?? null,
      experienceRequirements: item.experienceRequirements ?? null,
      academicProfile: item.academicProfile ?? null,
      specialization: item.specialization ?? null,
      knowledge: item.knowledge ?? null,
      competencies: item.competencies ?? null,
      capturedAt: new Date().toISOString(),
    };
  }

  async advanceToNextPage(): Promise<boolean> {
    if (this.pageIndex + 1 >= this.load().pages.length) {
      return false;
    }
    this.pageIndex++;
    return true;
  }
}
