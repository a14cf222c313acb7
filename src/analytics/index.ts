export { BLOOD_PRESSURE_CATEGORY_LABELS, classifyBloodPressure } from './bloodPressure';
export {
  analyzeFitnessTrend,
  analyzeTrendSamples,
  getExerciseStats,
  getFitnessTrendSamples,
  getTimeRangeCutoff,
} from './fitnessTrends';
export { averageMetricValue, metricTrend, summarizeMetric } from './metricTrends';
export { computeRollingAverage, computeRollingAverages } from './rollingAverages';
