import { setOutput } from '@actions/core'
import pc from 'picocolors'

/**
 * Publish command results as action outputs.
 *
 * Inside GitHub Actions (`GITHUB_OUTPUT` set) values go to the output file,
 * elsewhere they are printed as `name=value` lines.
 *
 * @param outputs - Output names and values.
 */
export function writeActionOutputs(outputs: Record<string, string>): void {
  let inActions = Boolean(process.env['GITHUB_OUTPUT'])

  for (let [name, value] of Object.entries(outputs)) {
    if (inActions) {
      setOutput(name, value)
    } else {
      console.info(`${pc.gray(name)}=${value}`)
    }
  }
}
