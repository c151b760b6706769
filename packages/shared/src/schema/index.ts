export { WorkoutNamesSchema, parseWorkoutNames, type WorkoutNames } from "./validation";
