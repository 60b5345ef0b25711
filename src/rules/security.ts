import { BaseRule } from '../analyzer/rule';
import { Priority, type Issue } from '../analyzer/types';
import type { SourceTree } from '../parser/tree-adapter';
import { callParts, isCallToName, keywordValue, literalOf, qualifiedCallee, unwrapParens, walk } from '../parser/syntax';

const DYNAMIC_EXECUTION = new Set(['eval', 'exec']);

export class EvalExecUse extends BaseRule {
  readonly name = 'EvalExecUse';
  readonly category = 'Security';
  readonly priority = Priority.HIGH;
  readonly impact = 'Arbitrary code execution risk.';

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      const call = callParts(node);
      if (!call || !isCallToName(call, DYNAMIC_EXECUTION)) continue;
      const name = unwrapParens(call.callee).text;
      issues.push(this.make(node.startLine, `Use of ${name}(). Avoid on untrusted input.`));
    }
    return issues;
  }
}

const PICKLE_READERS = new Set(['load', 'loads']);

export class DangerousFunctions extends BaseRule {
  readonly name = 'DangerousFunctions';
  readonly category = 'Security';
  readonly priority = Priority.HIGH;
  readonly impact = 'Unsafe deserialization or command injection risk.';

  check(_filename: string, tree: SourceTree | null): Issue[] {
    if (!tree) return [];
    const issues: Issue[] = [];
    for (const node of walk(tree.root)) {
      const call = callParts(node);
      const qualified = call ? qualifiedCallee(call) : null;
      if (!call || !qualified) continue;
      const [module, fn] = qualified;

      if (module === 'yaml' && fn === 'load' && !call.keywords.some((k) => k.name.toLowerCase() === 'loader')) {
        issues.push(this.make(node.startLine, 'yaml.load() without Loader; use yaml.safe_load or specify a safe Loader.'));
      }
      if (module === 'pickle' && PICKLE_READERS.has(fn)) {
        issues.push(this.make(node.startLine, 'pickle.load(s) on untrusted data is unsafe.'));
      }
      if (module === 'os' && fn === 'system') {
        issues.push(this.make(node.startLine, 'os.system used; prefer subprocess without shell=True.'));
      }
      if (module === 'subprocess') {
        const shell = keywordValue(call, 'shell');
        const flag = shell ? literalOf(shell) : null;
        if (flag?.kind === 'bool' && flag.value) {
          issues.push(this.make(node.startLine, 'subprocess with shell=True; risk of injection.'));
        }
      }
    }
    return issues;
  }
}
