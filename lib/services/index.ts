export * from './abbreviation-expander';
export * from './diagnosis-detector';
export * from './terminology-lookup-service';
// Note pipeline entry point
export { analyzeNote, type NoteAnalysis, type NoteAnalysisOptions, type CodedDiagnosis } from './note-analyzer';
