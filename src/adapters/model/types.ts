/**
 * Model Source Interface
 *
 * A model source hands back the raw, unvalidated content of a command model
 * document. Implementations:
 * - FileModelSource: a .yaml, .yml or .json file
 * - TextModelSource: a string already in memory
 */

export type ModelFormat = "yaml" | "json";

export interface ModelSource {
  /**
   * Where the document comes from, for error messages.
   */
  describe(): string;

  /**
   * Read and parse the document. Returns plain data; schema validation
   * happens when the model is linked.
   */
  read(): Promise<unknown>;
}
