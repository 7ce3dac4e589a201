import { csvkitColourizer } from '../transformers/colourizers/csvkit.js';
import { grcColourizer } from '../transformers/colourizers/grc.js';
import { jqColourizer } from '../transformers/colourizers/jq.js';
import { pygmentsColourizer } from '../transformers/colourizers/pygments.js';
import { armDissReformatter, armDumpiReformatter } from '../transformers/reformatters/armCode.js';
import { basicDetokeniseReformatter } from '../transformers/reformatters/basicDetokenise.js';
import { decaofReformatter } from '../transformers/reformatters/decaof.js';
import { junitXmlReformatter } from '../transformers/reformatters/junitXml.js';
import { alfLibraryReformatter, arArchiveReformatter } from '../transformers/reformatters/libraryArchives.js';
import { machoReformatter } from '../transformers/reformatters/macho.js';
import { markdownReformatter } from '../transformers/reformatters/markdown.js';
import { objdumpReformatter } from '../transformers/reformatters/objdump.js';
import { opensslReformatter } from '../transformers/reformatters/openssl.js';
import { plistReformatter } from '../transformers/reformatters/plist.js';
import { pycReformatter } from '../transformers/reformatters/pyc.js';
import { riscosDumpReformatter } from '../transformers/reformatters/riscosDump.js';
import { xmlLintReformatter } from '../transformers/reformatters/xmlLint.js';
import type { Transformer } from './transformerTypes.js';

// Highest priority first. Every reformatter outranks every colourizer.
const DEFAULT_REFORMATTERS: readonly Transformer[] = [
  junitXmlReformatter,
  xmlLintReformatter,
  basicDetokeniseReformatter,
  armDumpiReformatter,
  armDissReformatter,
  decaofReformatter,
  alfLibraryReformatter,
  arArchiveReformatter,
  riscosDumpReformatter,
  objdumpReformatter,
  machoReformatter,
  markdownReformatter,
  plistReformatter,
  opensslReformatter,
  pycReformatter,
];

const DEFAULT_COLOURIZERS: readonly Transformer[] = [
  csvkitColourizer,
  grcColourizer,
  jqColourizer,
  pygmentsColourizer,
];

export function defaultTransformers(): Transformer[] {
  return [...DEFAULT_REFORMATTERS, ...DEFAULT_COLOURIZERS];
}
