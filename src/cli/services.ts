import type { AppConfig } from '../config';
import { configureLogging } from '../logger';
import { ActivityLog } from '../activityLog';
import { Scheduler } from '../scheduler';
import { PaintingStore } from '../metadata/paintings';
import { PosterRegistry, buildPosterRegistry } from '../social/providers';
import { FilePostLog, PostLogger } from '../social/postLog';
import { BrowserProfile } from '../browser/profile';
import { LoginTracker } from '../browser/loginTracker';
import { ImageAnalyzer } from '../agent/analyzer';
import { RoundsStore } from '../agent/dailyPoster';

export interface AppServices {
  config: AppConfig;
  scheduler: Scheduler;
  paintings: PaintingStore;
  registry: PosterRegistry;
  postLog: PostLogger;
  activity: ActivityLog;
  rounds: RoundsStore;
  fasoProfile: BrowserProfile;
  caraProfile: BrowserProfile;
  logins: LoginTracker;
  // needs ANTHROPIC_API_KEY; only built when a command asks for it
  analyzer: () => ImageAnalyzer;
}

export function createServices(config: AppConfig): AppServices {
  configureLogging({ level: config.logLevel, logsDir: config.paths.logs });
  let analyzer: ImageAnalyzer | null = null;
  return {
    config,
    scheduler: new Scheduler(config.paths.scheduleFile),
    paintings: new PaintingStore(config.paths),
    registry: buildPosterRegistry(config),
    postLog: new FilePostLog(config.paths.logs, config.paths.screenshots),
    activity: new ActivityLog(config.paths.logs),
    rounds: new RoundsStore(config.paths.roundsFile),
    fasoProfile: new BrowserProfile('faso', config.paths.browserProfiles, config.paths.screenshots),
    caraProfile: new BrowserProfile('cara', config.paths.browserProfiles, config.paths.screenshots),
    logins: new LoginTracker(config.paths.loginStatusFile),
    analyzer: () => {
      if (!analyzer) analyzer = ImageAnalyzer.fromConfig(config.ai);
      return analyzer;
    },
  };
}

export function postingDeps(s: AppServices) {
  return {
    registry: s.registry,
    paintings: s.paintings,
    postLog: s.postLog,
    websiteUrl: s.config.websiteUrl,
  };
}
