import type { Rule } from '../analyzer/rule';
import { ComplexityRule } from './complexity';
import { ConcurrencyRule, ThreadSafetyRule } from './concurrency';
import {
  AssertForRuntime,
  DangerousTokenMagicNumbers,
  ExitCallsInLibrary,
  IdentityVsEquality,
  IgnoredReturnValueRule,
  MutableDefaultArgs,
  PotentialStringCastNeeded,
  ReturnAnnotationMismatch,
  TypeCheckRule,
} from './correctness';
import { BareOrBroadExcept, EmptyExceptBodyRule, ExceptionChainingRule } from './error-handling';
import {
  DictAccessGuard,
  LenComparisons,
  NonPythonicLoops,
  PlatformSpecificPaths,
  TodoComments,
  UnsafeCSVParsing,
} from './idioms';
import { CircularImportRule, ImportOrderRule, UnusedImports, WildcardImports } from './imports';
import { FileModeMismatch, OpenEncodingRule, OpenWithoutWith } from './resources';
import { DangerousFunctions, EvalExecUse } from './security';
import {
  FStringMissing,
  MagicLiteralRule,
  MissingDocstringRule,
  NamingConventions,
  PrintStatements,
  ShadowBuiltins,
  UnusedVariables,
} from './style';
import { UndefinedNameRule } from './undefined-names';

export interface RuleSetOptions {
  maxComplexity: number;
  maxFunctionLines: number;
}

export interface RuleSet {
  readonly rules: readonly Rule[];
}

export const DEFAULT_RULE_SET_OPTIONS: RuleSetOptions = {
  maxComplexity: 10,
  maxFunctionLines: 50,
};

/** Build the ordered registry. Findings are produced in this order before sorting. */
export function createRuleSet(options: RuleSetOptions = DEFAULT_RULE_SET_OPTIONS): RuleSet {
  const rules: Rule[] = [
    new BareOrBroadExcept(),
    new AssertForRuntime(),
    new MutableDefaultArgs(),
    new OpenWithoutWith(),
    new FileModeMismatch(),
    new NonPythonicLoops(),
    new LenComparisons(),
    new IdentityVsEquality(),
    new TypeCheckRule(),
    new UnsafeCSVParsing(),
    new EvalExecUse(),
    new DangerousFunctions(),
    new ConcurrencyRule(),
    new ExitCallsInLibrary(),
    new UnusedImports(),
    new UnusedVariables(),
    new WildcardImports(),
    new ShadowBuiltins(),
    new DangerousTokenMagicNumbers(),
    new PrintStatements(),
    new FStringMissing(),
    new NamingConventions(),
    new UndefinedNameRule(),
    new DictAccessGuard(),
    new ReturnAnnotationMismatch(),
    new TodoComments(),
    new PlatformSpecificPaths(),
    new PotentialStringCastNeeded(),
    new ExceptionChainingRule(),
    new EmptyExceptBodyRule(),
    new MagicLiteralRule(),
    new MissingDocstringRule(),
    new ComplexityRule({ maxComplexity: options.maxComplexity, maxLines: options.maxFunctionLines }),
    new IgnoredReturnValueRule(),
    new ImportOrderRule(),
    new CircularImportRule(),
    new OpenEncodingRule(),
    new ThreadSafetyRule(),
  ];
  return { rules };
}
