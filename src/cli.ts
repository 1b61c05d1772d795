#!/usr/bin/env node
import { config } from './config';
import { closeDatabase, getApplications, getJobById, getJobStats, getMarketAnalytics, loadProfile, saveApplication } from './db';
import { runSearch } from './scrapers/runner';
import { loadProfileFile, ProfileSession, type UserProfile } from './scorer/profile';
import { resolveScoringConfig } from './scorer/config';
import { HealthChecker } from './monitoring/health';
import { BackupManager } from './monitoring/backup';
import { MonitoringService } from './monitoring/service';
import { applicationUpdateSchema, nextActionsFor, summarizeApplications } from './tracking/applications';

const [command, ...args] = process.argv.slice(2);

function sessionProfile(): UserProfile {
  if (config.PROFILE_PATH) return loadProfileFile(config.PROFILE_PATH);
  return loadProfile() ?? new ProfileSession().snapshot();
}

async function main() {
  switch (command) {
    case 'search': {
      const query = args.join(' ').trim();
      const result = await runSearch(
        { queries: query ? [query] : undefined },
        sessionProfile(),
        resolveScoringConfig(config.SCORING_PRESET)
      );
      console.log(`\nTop ${result.jobs.length} of ${result.unique} unique listings:`);
      for (const job of result.jobs) {
        console.log(`  ${job.matchScore.toFixed(0).padStart(3)}  ${job.title} @ ${job.company} (${job.location})${job.salary ? ` ${job.salary}` : ''}`);
        if (job.url) console.log(`       ${job.url}`);
      }
      if (result.jobs.length === 0) console.log('  No jobs above the match threshold.');
      break;
    }

    case 'stats': {
      console.log('\nStats:', JSON.stringify(getJobStats(), null, 2));
      break;
    }

    case 'status': {
      const summary = await new HealthChecker().getHealthSummary();
      console.log(`\nOverall status: ${summary.overallStatus.toUpperCase()}`);
      for (const issue of summary.issues) console.log(`  - ${issue}`);
      console.log(`Database: ${summary.database.status} (${summary.database.responseTimeMs}ms, ${summary.database.jobCount ?? 0} jobs)`);
      for (const [name, api] of Object.entries(summary.apis.apis)) {
        console.log(`API ${name}: ${api.status} (${api.responseTimeMs}ms)`);
      }
      for (const [name, perf] of Object.entries(summary.performance)) {
        console.log(`  ${name} last hour: ${perf.requestCount} requests, avg ${perf.avgResponseTimeMs.toFixed(0)}ms, ${(perf.successRate * 100).toFixed(1)}% ok`);
      }
      break;
    }

    case 'applications': {
      const summary = summarizeApplications(getApplications());
      console.log(`\nApplications: ${summary.total} (${summary.followUpsDue} due a follow-up)`);
      for (const [status, count] of Object.entries(summary.byStatus)) console.log(`  ${status}: ${count}`);
      for (const app of summary.applications) {
        const flag = app.needsFollowUp ? ' [follow up]' : '';
        console.log(`  ${app.appliedDate}  ${app.status.padEnd(19)} ${app.title} @ ${app.company}${flag}`);
      }
      break;
    }

    case 'apply': {
      const [jobId, status] = args;
      const parsed = applicationUpdateSchema.safeParse({ status });
      if (!jobId || !parsed.success) {
        console.error('Usage: apply <jobId> [applied|interview_scheduled|interviewed|offer|rejected|withdrawn]');
        process.exitCode = 1;
        break;
      }
      if (!getJobById(jobId)) {
        console.error(`No stored job with id ${jobId}`);
        process.exitCode = 1;
        break;
      }
      const application = saveApplication(jobId, parsed.data);
      console.log(`\n${application.title} @ ${application.company}: ${application.status}, follow up on ${application.followUpDate}`);
      for (const action of nextActionsFor(application.status)) console.log(`  - ${action}`);
      break;
    }

    case 'analytics': {
      const days = args[0] ? parseInt(args[0], 10) : 30;
      if (!Number.isInteger(days) || days <= 0) {
        console.error('Usage: analytics [days]');
        process.exitCode = 1;
        break;
      }
      console.log('\nAnalytics:', JSON.stringify(getMarketAnalytics(days), null, 2));
      break;
    }

    case 'monitor': {
      const monitor = new MonitoringService();
      monitor.start();
      process.on('SIGINT', () => {
        monitor.stop();
        closeDatabase();
        process.exit(0);
      });
      return;
    }

    case 'backup': {
      const file = await new BackupManager().backupDatabase();
      console.log(file ? `\nBackup created: ${file}` : '\nBackup failed');
      if (!file) process.exitCode = 1;
      break;
    }

    case 'maintenance': {
      const report = await new MonitoringService().runMaintenance();
      console.log('\nMaintenance:', JSON.stringify(report, null, 2));
      break;
    }

    default:
      console.log(`
Usage:
  tsx src/cli.ts search [query...]   Search all sources and rank for the saved profile
  tsx src/cli.ts stats               Show stored job stats
  tsx src/cli.ts applications        List tracked applications and follow-ups due
  tsx src/cli.ts apply <jobId> [status]  Record an application for a stored job
  tsx src/cli.ts analytics [days]    Popular searches, top companies and application statuses
  tsx src/cli.ts status              Run health checks
  tsx src/cli.ts monitor             Run health checks on a timer until Ctrl+C
  tsx src/cli.ts backup              Create a gzipped database backup
  tsx src/cli.ts maintenance         Backup, prune old backups and metrics
      `);
  }

  closeDatabase();
}

main().catch(err => {
  console.error('Error:', err);
  process.exit(1);
});
