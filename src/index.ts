import 'dotenv/config';
import { Command } from 'commander';
import { loadConfig } from './config';
import { ConfigurationError, errorMessage } from './errors';
import { AppServices, createServices } from './cli/services';
import { say } from './cli/ui';
import { postSocial, showPlatforms, verifyConfig } from './cli/social';
import { checkSchedule, schedulePost, viewSchedule, watch } from './cli/schedule';
import { dailyPost } from './cli/daily';
import { caraLogin, fasoLogin, uploadGallery } from './cli/gallery';
import { processPaintings } from './cli/process';
import { editMetadata, generateSkeletonMetadata, organizePaintings } from './cli/metadata';

let services: AppServices | null = null;
function app(): AppServices {
  if (!services) services = createServices(loadConfig());
  return services;
}

const program = new Command();

program.name('studio-courier').description('Painting metadata, gallery uploads and social media posting').version('0.1.0');

program
  .command('process')
  .description('Describe new paintings and write their metadata')
  .action(() => processPaintings(app()));

program
  .command('organize')
  .description('Move processed paintings into their collection folders')
  .action(() => organizePaintings(app()));

program
  .command('edit-metadata')
  .description('Review and edit painting metadata')
  .action(() => editMetadata(app()));

program
  .command('generate-skeletons')
  .description('Write bare metadata for paintings that have none')
  .action(() => generateSkeletonMetadata(app()));

program
  .command('post-social')
  .description('Post unposted paintings to a platform')
  .action(() => postSocial(app()));

program
  .command('schedule-post')
  .description('Schedule a painting for a platform at a future time')
  .action(() => schedulePost(app()));

program
  .command('view-schedule')
  .description('Show upcoming and recent scheduled posts')
  .action(() => viewSchedule(app()));

program
  .command('check-schedule')
  .description('Post everything that is due (for cron)')
  .action(async () => {
    try {
      await checkSchedule(app());
    } catch (err) {
      console.error(errorMessage(err));
    }
    process.exitCode = 0;
  });

program
  .command('watch')
  .description('Check the schedule every 5 minutes until stopped')
  .action(() => watch(app()));

program
  .command('daily-post')
  .description('Post one painting to every daily platform')
  .action(() => dailyPost(app()));

program
  .command('upload-gallery')
  .description('Upload ready paintings to FASO')
  .action(() => uploadGallery(app()));

program
  .command('faso-login')
  .description('Log in to FASO in a browser window and keep the session')
  .action(() => fasoLogin(app()));

program
  .command('cara-login')
  .description('Log in to Cara in a browser window and keep the session')
  .action(() => caraLogin(app()));

program
  .command('platforms')
  .description('Show which platforms are ready and how old the browser logins are')
  .action(() => showPlatforms(app()));

program
  .command('verify-config')
  .description('Show configured paths and credentials')
  .action(() => verifyConfig(app()));

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    say.error(err.message);
    for (const field of err.fields) say.dim(`  ${field}`);
  } else {
    say.error(errorMessage(err));
  }
  process.exitCode = 1;
});
