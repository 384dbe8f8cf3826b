/**
 * The single operation the core asks of a text-generation backend.
 * Implementations never throw for ordinary provider failures; they return
 * sentinel text instead.
 */
export interface TextGenerator {
  readonly name: string;
  generate(prompt: string): Promise<string>;
}
