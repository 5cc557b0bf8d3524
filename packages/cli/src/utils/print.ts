import { VERSION } from '@cronkeep/core';

const ESC = '\x1b[';

export const bold = (s: string) => `${ESC}1m${s}${ESC}0m`;
export const dim = (s: string) => `${ESC}2m${s}${ESC}0m`;
export const green = (s: string) => `${ESC}32m${s}${ESC}0m`;
export const red = (s: string) => `${ESC}31m${s}${ESC}0m`;

export function banner(title: string): void {
  const line = '─'.repeat(title.length + 4);
  console.log(bold(title));
  console.log(dim(line));
}

export function printUsage(): void {
  console.log(`
${bold('cronkeep')} v${VERSION}

${bold('Usage:')} cronkeep <command> [options]

${bold('Commands:')}
  init        Write a default config to ~/.cronkeep/config.json
  status      Show configuration and scheduler status
  list        List enabled jobs (--all includes disabled ones)
  add         Add a job (--every <s> | --cron <expr> | --at <iso> | --in <s>)
              with --message <text> or --task <name> [--arg <value>...]
              [--name <label>] [--tz <zone>] [--channel <c> --to <id>]
              [--delete-after-run] removes an --at job once it has fired
  remove      Remove a job by id
  enable      Enable a job by id
  disable     Disable a job by id
  run         Start the scheduler in the foreground

${bold('Examples:')}
  cronkeep add --cron "0 9 * * *" --tz Asia/Shanghai --message "stand-up"
  cronkeep add --every 300 --task backup --arg --full
  cronkeep run
`);
}
