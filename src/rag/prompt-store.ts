import { readFile, writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { RAG_CONFIG } from "./config.js";
import { PromptNotFoundError } from "./errors.js";

const PromptFileSchema = z.record(z.array(z.object({ template: z.string() })));

export type PromptFile = z.infer<typeof PromptFileSchema>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Prompt templates grouped by category, each category an ordered list. Every
 * mutation is written straight back to the JSON file.
 */
export class PromptStore {
  private constructor(
    private readonly filePath: string,
    private prompts: PromptFile,
  ) {}

  static async open(filePath: string = RAG_CONFIG.promptsPath): Promise<PromptStore> {
    let prompts: PromptFile;
    try {
      const data = await readFile(filePath, "utf-8");
      prompts = PromptFileSchema.parse(JSON.parse(data));
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      prompts = { [RAG_CONFIG.metadataPromptCategory]: [] };
    }
    return new PromptStore(filePath, prompts);
  }

  private async persist(): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(this.prompts, null, 2) + "\n");
  }

  list(category: string): string[] {
    return (this.prompts[category] ?? []).map((p) => p.template);
  }

  get(category: string, index: number): string | null {
    return this.prompts[category]?.[index]?.template ?? null;
  }

  require(category: string, index: number): string {
    const template = this.get(category, index);
    if (template === null) throw new PromptNotFoundError(category, index);
    return template;
  }

  async add(category: string, template: string): Promise<number> {
    const entries = (this.prompts[category] ??= []);
    entries.push({ template });
    await this.persist();
    return entries.length - 1;
  }

  async edit(category: string, index: number, template: string): Promise<void> {
    const entry = this.prompts[category]?.[index];
    if (!entry) throw new PromptNotFoundError(category, index);
    entry.template = template;
    await this.persist();
  }

  async remove(category: string, index: number): Promise<void> {
    const entries = this.prompts[category];
    if (!entries || index < 0 || index >= entries.length) {
      throw new PromptNotFoundError(category, index);
    }
    entries.splice(index, 1);
    await this.persist();
  }
}
