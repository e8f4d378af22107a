export { ConversionScheduler, type SchedulerOptions, type ShutdownOptions } from './scheduler';
export { ResultStore } from './result-store';
export { DocumentPreparer, type InputPreparer } from './preparer';
export { createJob, transition, canTransition, isTerminal, snapshot, toJobView, type JobDefaults } from './job';
