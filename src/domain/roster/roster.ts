// ---------------------------------------------------------------------------
// Roster: the set of library members and what each currently holds.
// ---------------------------------------------------------------------------

import type { AddFailureCode, BookId, Member, MemberId, Result } from "../../core/types.js";
import { FailureCode } from "../../core/types.js";

/** Normalise raw caller input into a branded member id. */
export function toMemberId(raw: string | number): MemberId {
  return String(raw).trim() as MemberId;
}

export function cloneMember(member: Member): Member {
  return { ...member, borrowedBookIds: [...member.borrowedBookIds] };
}

export class Roster {
  private readonly members = new Map<MemberId, Member>();

  constructor(initial: Member[] = []) {
    for (const member of initial) {
      this.members.set(member.id, member);
    }
  }

  get size(): number {
    return this.members.size;
  }

  addMember(id: string, name: string): Result<Member, AddFailureCode> {
    const memberId = toMemberId(id);
    const cleanName = name.trim();

    if (!memberId || !cleanName) {
      return { ok: false, error: { code: FailureCode.INVALID_INPUT } };
    }
    if (this.members.has(memberId)) {
      return { ok: false, error: { code: FailureCode.DUPLICATE_ID } };
    }

    const member: Member = { id: memberId, name: cleanName, borrowedBookIds: [] };
    this.members.set(memberId, member);
    return { ok: true, value: member };
  }

  /** Record that `member` now holds `bookId`. No-op if already recorded. */
  attach(member: Member, bookId: BookId): void {
    if (!member.borrowedBookIds.includes(bookId)) {
      member.borrowedBookIds.push(bookId);
    }
  }

  detach(member: Member, bookId: BookId): void {
    member.borrowedBookIds = member.borrowedBookIds.filter((id) => id !== bookId);
  }

  findById(id: string): Member | null {
    return this.members.get(toMemberId(id)) ?? null;
  }

  /** Case-insensitive exact name match; the earliest-added member wins. */
  findByNameExact(name: string): Member | null {
    const wanted = name.trim().toLowerCase();
    for (const member of this.members.values()) {
      if (member.name.toLowerCase() === wanted) return member;
    }
    return null;
  }

  list(): Member[] {
    return [...this.members.values()];
  }
}
