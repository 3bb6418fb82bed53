import chalk from 'chalk'

/** Colour roles of the settings renderers. */
export const t = {
  name:  chalk.hex('#5FAFD7'),
  value: chalk.hex('#EEEEEE'),
  label: chalk.hex('#8A8A8A'),
  faint: chalk.hex('#585858'),
  ok:    chalk.hex('#87D787'),
  warn:  chalk.hex('#D7AF5F'),
  error: chalk.hex('#D75F5F'),
} as const
