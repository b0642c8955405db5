import { existsSync } from 'fs';
import chalk from 'chalk';
import type { Painting } from '../models';
import { paintingTitle } from '../metadata/paintings';
import { formatPostText } from '../social/formatter';
import { platformStatus } from '../social/providers';
import type { SocialPoster } from '../social/platform';
import { postPainting } from '../agent/executor';
import { BROWSER_LOGIN_PLATFORMS, LoginState, describeLoginStatus } from '../browser/loginTracker';
import { AppServices, postingDeps } from './services';
import { say, choose, confirm, table } from './ui';

export async function pickReadyPlatform(s: AppServices): Promise<SocialPoster | null> {
  const ready = s.registry.ready();
  if (ready.length === 0) {
    say.warning('No platforms are configured. Run `studio-courier platforms` to see what is missing.');
    return null;
  }
  return choose(
    'Platform:',
    ready.map((p) => ({ name: p.displayName, value: p }))
  );
}

export async function postSocial(s: AppServices) {
  s.activity.record('post-social');
  say.header('Post to social media');

  const poster = await pickReadyPlatform(s);
  if (!poster) return;

  say.info(`Verifying ${poster.displayName} credentials...`);
  if (!(await poster.verifyCredentials())) {
    s.postLog.credentialFailure(poster.name);
    say.error(`${poster.displayName} credentials are invalid`);
    return;
  }

  const unposted = s.paintings.findUnposted(poster.name);
  if (unposted.length === 0) {
    say.info(`Every painting is already on ${poster.displayName}`);
    return;
  }

  const picked = await choose<Painting[]>('Painting:', [
    ...unposted.map((p) => ({ name: paintingTitle(p.record), value: [p] })),
    { name: chalk.bold(`All unposted (${unposted.length})`), value: unposted },
  ]);

  let posted = 0;
  for (const painting of picked) {
    const caption = formatPostText(painting.record, { websiteUrl: s.config.websiteUrl });
    say.rule();
    say.header(paintingTitle(painting.record));
    console.log(caption);
    say.dim(`image: ${s.paintings.resolveImagePath(painting.record) ?? 'not found'}`);
    if (poster.maxTextLength > 0 && caption.length > poster.maxTextLength) {
      say.warning(`Caption is ${caption.length} characters; ${poster.displayName} allows ${poster.maxTextLength}`);
    }
    if (!(await confirm(`Post to ${poster.displayName}?`))) continue;

    const { result } = await postPainting(postingDeps(s), painting, poster, { caption });
    if (result.success) {
      posted++;
      say.success(`Posted${result.postUrl ? `: ${result.postUrl}` : ''}`);
    } else {
      say.error(result.error);
    }
  }
  say.info(`${posted} of ${picked.length} posted`);
}

const STATUS_COLOUR = {
  ready: chalk.green,
  'not configured': chalk.yellow,
  'not yet implemented': chalk.dim,
} as const;

const LOGIN_COLOUR: Record<LoginState, (text: string) => string> = {
  ok: chalk.green,
  warn: chalk.yellow,
  expired: chalk.red,
  never: chalk.dim,
};

export function showPlatforms(s: AppServices) {
  say.header('Platforms');
  table(
    s.registry.all().map((p) => {
      const status = platformStatus(p);
      return [p.displayName, STATUS_COLOUR[status](status)];
    }),
    [14]
  );

  say.header('Browser logins');
  table(
    BROWSER_LOGIN_PLATFORMS.map((name) => {
      const login = s.logins.status(name);
      return [name, LOGIN_COLOUR[login.state](describeLoginStatus(login))];
    }),
    [14]
  );
  for (const alert of s.logins.alerts()) say.warning(`Run studio-courier ${alert.platform}-login to renew the ${alert.platform} session`);
}

export function verifyConfig(s: AppServices) {
  const { paths, ai, websiteUrl } = s.config;
  say.header('Configuration');
  const dirs: [string, string][] = [
    ['Paintings (big)', paths.paintingsBig],
    ['Paintings (instagram)', paths.paintingsInstagram],
    ['Metadata', paths.metadataOutput],
    ['App data', paths.appData],
    ['Logs', paths.logs],
  ];
  for (const [label, dir] of dirs) {
    const mark = existsSync(dir) ? chalk.green('✓') : chalk.red('✗ missing');
    console.log(`${label.padEnd(22)} ${dir} ${mark}`);
  }
  console.log(`${'Schedule file'.padEnd(22)} ${paths.scheduleFile}`);
  console.log(`${'Website'.padEnd(22)} ${websiteUrl || chalk.yellow('not set')}`);
  console.log(`${'Anthropic API key'.padEnd(22)} ${ai.apiKey ? chalk.green('present') : chalk.red('missing')}`);
  console.log(`${'Model'.padEnd(22)} ${ai.model}`);
  say.info(`${s.registry.ready().length} platform(s) ready`);
}
