import { SymbolExtractor } from "../core/services/SymbolExtractor.js";
import { GoSyntaxExtractor } from "./extractors/GoSyntaxExtractor.js";
import { JavaPatternExtractor } from "./extractors/JavaPatternExtractor.js";
import { PythonPatternExtractor } from "./extractors/PythonPatternExtractor.js";
import { RustPatternExtractor } from "./extractors/RustPatternExtractor.js";
import { TypeScriptPatternExtractor } from "./extractors/TypeScriptPatternExtractor.js";

export { GoSyntaxExtractor, extractErrors } from "./extractors/GoSyntaxExtractor.js";
export { JavaPatternExtractor } from "./extractors/JavaPatternExtractor.js";
export { PythonPatternExtractor, isPythonPublic } from "./extractors/PythonPatternExtractor.js";
export { RustPatternExtractor } from "./extractors/RustPatternExtractor.js";
export { TypeScriptPatternExtractor } from "./extractors/TypeScriptPatternExtractor.js";

/**
 * Extractor with every supported language registered.
 */
export function createSymbolExtractor(): SymbolExtractor {
  return new SymbolExtractor([
    new GoSyntaxExtractor(),
    new TypeScriptPatternExtractor(),
    new PythonPatternExtractor(),
    new RustPatternExtractor(),
    new JavaPatternExtractor(),
  ]);
}
