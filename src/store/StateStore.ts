export interface StateStore {
  /** Where the state lives, for diagnostics. */
  readonly location: string;
  /** Resolves `null` when nothing has been saved yet. */
  read(): Promise<string | null>;
  write(text: string): Promise<void>;
  close?(): Promise<void>;
}
