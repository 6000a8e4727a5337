/**
 * Key-value persistence for engine state: learned priors, knowledge
 * memory, the decision outcome index.
 */
export interface Storage {
  /**
   * Load data by key.
   * @returns The parsed data, or null if the key was never saved
   */
  load(key: string): Promise<unknown>;

  /** Replace the value stored under key */
  save(key: string, data: unknown): Promise<void>;

  /**
   * @returns true if deleted, false if the key didn't exist
   */
  delete(key: string): Promise<boolean>;

  exists(key: string): Promise<boolean>;
}
