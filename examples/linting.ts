import { Linter } from "../src/linter";

const source = "SELECT a FROM foo ;\nSELECT b\nFROM bar -- keep me\nSELECT 1;;";
const linter = new Linter({ multilineNewline: true, requireFinalSemicolon: true });

for (const diagnostic of linter.lint(source)) {
  const location = diagnostic.location
    ? `${diagnostic.location.line}:${diagnostic.location.column}`
    : "unknown";
  console.info(`[${diagnostic.severity}] ${location} ${diagnostic.rule}: ${diagnostic.message}`);
}

const result = linter.fix(source);
console.info(`Fixed in ${result.loops} pass(es):\n${result.source}`);
