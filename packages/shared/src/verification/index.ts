/**
 * Verification Module
 */

export { DocumentVerifier, type DocumentVerifierOptions, type ExtractOptions, type ReportOptions } from './verifier';
export { classifyTranscript, inferDocumentType } from './type-inference';
export { assessAuthenticity, readVerdict, isEmptyVerdict, isFlaggedAsFraud } from './authenticity';
