/**
 * SignalRadar — Quality Module
 */

export { evaluateQuality, isAcceptable, type QualityVerdict } from './filter';
