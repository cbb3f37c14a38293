import { Command, Option } from 'commander'

import { ENHANCEMENT_LEVELS, PROMPT_STYLES } from '../enhance/types.js'
import { VIDEO_QUALITIES } from '../media/yt-dlp.js'

function addSettingsOptions(command: Command): Command {
  return (
    command
      // detection
      .option('-s, --sensitivity <value>', 'Structural change threshold, 0-1 (default: 0.3)')
      .option('--histogram-threshold <value>', 'Color histogram change threshold, 0-1 (default: 0.15)')
      .option('-m, --min-time <seconds>', 'Minimum seconds between slide changes (default: 2)')
      .option('--intro-outro', 'Skip the intro and outro (default)')
      .option('--no-intro-outro', 'Analyse the whole video')
      .option('--intro-outro-duration <seconds>', 'Seconds skipped at each end (default: 30)')
      .option('--frame-rate <fps>', 'Analysis frames per second (default: 1)')
      .option('--analysis-width <px>', 'Width frames are scaled to for analysis (default: 320)')
      .option('--comparison-width <px>', 'Downscale frames to this width before structural comparison')
      .option('--time-limit <seconds>', 'Longest a single slide window may run (default: 300)')
      .option('--min-confidence <value>', 'Drop changes below this confidence (default: 0.3)')
      .option('--merge-threshold <seconds>', 'Merge changes closer than this (default: 1)')
      // output
      .addOption(new Option('-f, --format <format>', 'Document format (default: html)').choices(['md', 'html']))
      .option('-o, --output <file>', 'Document file name (default: presentation.<format>)')
      .option('-d, --output-dir <dir>', 'Output directory (default: ./output)')
      .option('--timestamps', 'Show slide time ranges (default)')
      .option('--no-timestamps', 'Hide slide time ranges')
      .option('--navigation', 'Include a table of contents (default)')
      .option('--no-navigation', 'Omit the table of contents')
      .addOption(
        new Option('--screenshot-format <format>', 'Screenshot image format (default: png)').choices([
          'png',
          'jpg',
        ])
      )
      .option('--screenshot-width <px>', 'Scale screenshots to this width')
      .option('--transcripts', 'Write original/enhanced transcript text files (default)')
      .option('--no-transcripts', 'Skip the transcript text files')
      .addOption(
        new Option('--video-quality <quality>', 'Download quality for URLs (default: 720p)').choices(
          VIDEO_QUALITIES
        )
      )
      // enhancement
      .option('--enhance', 'Rewrite the transcript with an LLM')
      .option('--no-enhance', 'Disable LLM enhancement')
      .addOption(
        new Option('--enhancement-level <level>', 'Enhancement depth (default: detailed)').choices([
          ...ENHANCEMENT_LEVELS,
        ])
      )
      .addOption(
        new Option('--prompt-style <style>', 'Writing style (default: clear)').choices([...PROMPT_STYLES])
      )
      .option('--prompt <template>', 'Custom prompt; {text}, {level} and {style} are substituted')
      .option('--model <id>', 'Model id, e.g. anthropic/claude-sonnet-4-5 or openai/gpt-4o-mini')
      .option('--batch-target-tokens <count>', 'Target tokens per enhancement batch (default: 1500)')
      .option('--batching', 'Batch segments per request (default)')
      .option('--no-batching', 'One request per segment')
      .option('--max-cost <usd>', 'Stop enhancing past this estimated cost; 0 = no cap (default: 5)')
      .option('--cache', 'Reuse cached enhancement results (default)')
      .option('--no-cache', 'Ignore and do not write the enhancement cache')
      .option('--retries <count>', 'Retries per failed LLM call, 0-5 (default: 2)')
      .option('--timeout <duration>', 'Per LLM call timeout: 30s, 2m, 5000ms (default: 2m)')
      // config & logging
      .option('--config <path>', 'Config file (default: ~/.talkdeck/config.json)')
      .option('--save-config <path>', 'Write the resolved settings as a config file')
      .addOption(
        new Option('--log-level <level>', 'Log level (default: info)').choices([
          'debug',
          'info',
          'warn',
          'error',
        ])
      )
      .option('--log-file <path>', 'Also append JSON log lines to this file')
      .option('-v, --verbose', 'Debug logging', false)
      .option('-q, --quiet', 'Warnings and errors only', false)
  )
}

export function buildProgram(): Command {
  const program = new Command()
    .name('talkdeck')
    .description('Turn a recorded talk into a slide deck: one screenshot and transcript per slide.')
    .argument('[input]', 'Video file path or URL (URLs are fetched with yt-dlp)')
    .option('--subtitles <file>', 'Subtitle file (.srt, .vtt, .json) to use as the transcript')
    .option('-V, --version', 'Print version and exit', false)
    .allowExcessArguments(false)
  return addSettingsOptions(program)
}

export function buildBatchProgram(): Command {
  const program = new Command()
    .name('talkdeck batch')
    .description('Process a list of videos (one path or URL per line, # for comments).')
    .argument('[list-file]', 'Text file with one input per line')
    .option('--continue-on-error', 'Keep going after a video fails', false)
    .option('--delay <seconds>', 'Pause between videos (default: 0)')
    .allowExcessArguments(false)
  return addSettingsOptions(program)
}
