import { loadConfig, validateConfig } from '../src/config';
import { createDependencies } from '../src/presentation/app';
import { GenerationJob } from '../src/domain/entities/GenerationJob';

/**
 * Polls every active job once and prints where each job stands.
 *
 * Usage: npm run check-status
 */
async function checkStatus(): Promise<void> {
    const config = loadConfig();
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        configErrors.forEach((error) => console.error(`  - ${error}`));
        process.exitCode = 1;
        return;
    }

    const { tracker, poller } = createDependencies(config);
    const jobs = tracker.listJobs();
    if (jobs.length === 0) {
        console.log('No jobs found.');
        return;
    }

    console.log(`Checking ${tracker.activeJobs().length} of ${jobs.length} jobs...`);
    const outcomes = await poller.tick();
    const changed = new Set(outcomes.filter((outcome) => outcome.changed).map((outcome) => outcome.jobId));

    console.log('------------------------------------------------');
    for (const job of tracker.listJobs()) {
        printJob(job, changed.has(job.id));
        console.log('------------------------------------------------');
    }
}

function printJob(job: GenerationJob, changed: boolean): void {
    console.log('Job ID:', job.id);
    console.log('Status:', changed ? `${job.status} (updated)` : job.status);
    console.log('Created:', job.createdAt.toISOString());
    console.log('Images:', job.images.length);
    console.log('Style:', job.style);
    if (job.abandoned) {
        console.log('Abandoned: yes');
    }
    if (job.status === 'succeeded') {
        console.log('Video:', job.localPath ?? job.resultRef);
    }
    if (job.status === 'failed') {
        console.log('Error:', job.failureReason ?? 'Unknown failure');
    }
}

checkStatus().catch((err) => {
    console.error('Error checking job status:', err);
    process.exitCode = 1;
});
