/**
 * Text measurement.
 */

export {
  FixedAdvanceMeasurementProvider,
  type MeasurementProvider,
  type FixedAdvanceConfig,
} from './MeasurementProvider.js';

export {
  CanvasMeasurementProvider,
  fontFamilyWithFallbacks,
  type CanvasMeasurementConfig,
  type TextMeasuringContext,
} from './CanvasMeasurementProvider.js';
