import type { MenuAction, PromptFunction, PromptSource } from "./types";

export function toPromptSource(prompt: string, promptFunction?: PromptFunction): PromptSource {
  return promptFunction ? { kind: "dynamic", generate: promptFunction } : { kind: "static", text: prompt };
}

/**
 * A named node holding selectable options. Menus do not know their parents
 * or children; the tree owns that relation.
 */
export class Menu {
  readonly name: string;

  private promptSource: PromptSource;
  private lastPrompt = "";
  private readonly options = new Map<string, MenuAction>();
  private optionsOrder: string[] = [];

  // Render bookkeeping, rebuilt by the renderer.
  hotKeys = new Map<string, number>();
  selection = 0;
  lastRenderLines = 0;
  longestLine = 0;

  /** `promptFunction` wins over `prompt` when both are given. */
  constructor(name: string, prompt = "", promptFunction?: PromptFunction) {
    this.name = name;
    this.promptSource = toPromptSource(prompt, promptFunction);
  }

  get optionCount(): number {
    return this.optionsOrder.length;
  }

  /** Static prompt text, or the text a prompt function produced on the last render. */
  get prompt(): string {
    return this.promptSource.kind === "static" ? this.promptSource.text : this.lastPrompt;
  }

  setPrompt(prompt: string, promptFunction?: PromptFunction) {
    this.promptSource = toPromptSource(prompt, promptFunction);
    this.lastPrompt = "";
  }

  // Called once per render.
  resolvePrompt(): string {
    if (this.promptSource.kind === "static") return this.promptSource.text;
    this.lastPrompt = this.promptSource.generate();
    return this.lastPrompt;
  }

  /** Binds `name` to `action`. Re-adding a name replaces the action and moves it last. */
  addOption(name: string, action: MenuAction) {
    this.options.set(name, action);
    this.optionsOrder = this.optionsOrder.filter((n) => n !== name);
    this.optionsOrder.push(name);
  }

  deleteOption(name: string) {
    this.options.delete(name);
    this.optionsOrder = this.optionsOrder.filter((n) => n !== name);
  }

  optionNames(): string[] {
    return [...this.optionsOrder];
  }

  optionAt(index: number): string | undefined {
    return this.optionsOrder[index];
  }

  getOption(name: string): MenuAction | undefined {
    return this.options.get(name);
  }
}
