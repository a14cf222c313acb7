import { EXERCISE_CATEGORY_INFO, getExerciseColor, listExerciseTypes } from '../catalog';
import { HttpStatus } from '../config';
import { ExerciseListQuerySchema } from '../validation/schemas';
import { handle, parseInput } from './respond';

/**
 * The exercise catalog, each entry with its category's display color.
 */
export const listExercises = handle('listExercises', async (req, res) => {
  const query = parseInput(ExerciseListQuerySchema, req.query, req, res);
  if (!query) return;

  res.status(HttpStatus.OK).json({
    categories: EXERCISE_CATEGORY_INFO,
    exercises: listExerciseTypes(query.category).map((info) => ({
      ...info,
      color: getExerciseColor(info),
    })),
  });
});
