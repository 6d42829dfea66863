/**
 * Object store for generated documents. Names are forward-slash relative
 * keys such as `lead_pdfs/2025/03/LI-2025-1_Term_Life_Plan_20250301.pdf`.
 */
export interface FileStorage {
  /** Stores the bytes and returns the key they were stored under. */
  save(name: string, content: Buffer, contentType: string): Promise<string>;
  url(name: string): string;
  /** Removes the object; a missing one counts as removed. */
  delete(name: string): Promise<void>;
}

export const FILE_STORAGE = 'FILE_STORAGE';
