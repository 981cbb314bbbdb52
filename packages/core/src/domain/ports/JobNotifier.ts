import type { Job } from '../model/Job.js';

/** Port for telling the outside world a job reached `COMPLETED` or `FAILED`. */
export interface JobNotifier {
  notify(job: Job): Promise<void>;
}
