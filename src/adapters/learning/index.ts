export { createRuleStore, loadRuleStore, emptyRuleTable, rulesDocumentSchema, correctionLineSchema } from './rule-store';
export type { RuleStorage, RuleStoreState, RulesDocument, CorrectionLine } from './rule-store';
export { domainKey, subjectWords, dominantCategory } from './promotion';
