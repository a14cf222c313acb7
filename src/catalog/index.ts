export {
  EXERCISE_CATEGORY_INFO,
  findExerciseType,
  getExerciseColor,
  isKnownExerciseType,
  listExerciseTypes,
} from './exerciseCatalog';
export { METRIC_TYPE_INFO, getMetricTypeInfo, isMetricType } from './metricTypes';
