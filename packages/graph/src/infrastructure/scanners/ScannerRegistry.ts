import type { Language } from "../../core/model.js";
import type { SourceScanner } from "../../core/ports/SourceScanner.js";
import { extensionOf } from "../../core/paths.js";
import { PatternScanner } from "./PatternScanner.js";
import { TypeScriptScanner } from "./TypeScriptScanner.js";

export interface ScannerMatch {
  scanner: SourceScanner;
  language: Language;
}

/**
 * Maps file extensions to scanners. Registering a scanner for an extension
 * that is already taken replaces the previous owner.
 */
export class ScannerRegistry {
  private byExtension = new Map<string, ScannerMatch>();

  constructor(scanners: SourceScanner[] = []) {
    for (const scanner of scanners) this.register(scanner);
  }

  register(scanner: SourceScanner): void {
    for (const [extension, language] of Object.entries(scanner.extensions)) {
      this.byExtension.set(extension.toLowerCase(), { scanner, language });
    }
  }

  scannerFor(path: string): ScannerMatch | null {
    return this.byExtension.get(extensionOf(path)) ?? null;
  }

  supports(path: string): boolean {
    return this.byExtension.has(extensionOf(path));
  }

  extensions(): string[] {
    return [...this.byExtension.keys()].sort();
  }
}

export function createDefaultRegistry(): ScannerRegistry {
  return new ScannerRegistry([
    new TypeScriptScanner(),
    new PatternScanner("python"),
    new PatternScanner("go"),
    new PatternScanner("rust"),
    new PatternScanner("java"),
  ]);
}
