import type {
  ArchiveBorrowerResult,
  Borrower,
  BorrowerFilters,
  CreateBorrowerInput,
  UpdateBorrowerInput,
} from '../../types/borrower.types';

export interface IBorrowerRepository {
  create(input: CreateBorrowerInput): Promise<Borrower>;
  findById(id: number): Promise<Borrower | null>;
  findByRfid(rfid: string): Promise<Borrower | null>;
  list(filters: BorrowerFilters): Promise<Borrower[]>;
  update(id: number, input: UpdateBorrowerInput): Promise<Borrower | null>;
  /**
   * Archive only while the borrower holds nothing. Serializes with issuing,
   * so a borrow cannot land on a borrower being archived.
   */
  archive(id: number): Promise<ArchiveBorrowerResult>;
  restore(id: number): Promise<Borrower | null>;
}
