export {
  SyntaxFactExtractor,
  positionalParameters,
  isLiteralConstant,
  type NameFact,
  type SyntaxFacts,
  type SyntaxFactOptions,
  type VariableScope,
} from './syntax-facts.js';
