export type MeasurementTask = () => void;

/** Runs a task once, after the current commit. Not cancellable. */
export type MeasurementScheduler = (task: MeasurementTask) => void;

/** Next macrotask: the surface has been attached and laid out at its final width by then. */
export const scheduleNextTick: MeasurementScheduler = (task) => {
  setTimeout(task, 0);
};
