/**
 * Borrower domain types
 */

export enum BorrowerRole {
  STUDENT = 'student',
  INSTRUCTOR = 'instructor',
  STAFF = 'staff',
}

export interface Borrower {
  id: number;
  rfid: string;
  borrowerCode: string;
  firstName: string;
  lastName: string;
  department: string | null;
  course: string | null;
  role: BorrowerRole;
  email: string | null;
  archivedAt: Date | null;
  createdAt: Date;
}

export interface CreateBorrowerInput {
  rfid: string;
  borrowerCode: string;
  firstName: string;
  lastName: string;
  department?: string | null;
  course?: string | null;
  role: BorrowerRole;
  email?: string | null;
}

export type UpdateBorrowerInput = Partial<CreateBorrowerInput>;

export type ArchiveBorrowerResult =
  | { status: 'archived'; borrower: Borrower }
  | { status: 'has_open_borrows'; openTransactions: number }
  | { status: 'not_found' };

export interface BorrowerFilters {
  role?: BorrowerRole;
  search?: string;
  archived: boolean;
}

export function fullName(person: { firstName: string; lastName: string }): string {
  return `${person.firstName} ${person.lastName}`;
}
