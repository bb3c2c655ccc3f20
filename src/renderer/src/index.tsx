import { render } from 'ink'
import App from './App'
import type { TuiServices } from './services'
import type { StreamOptions } from './state'

export { createServices } from './services'

/** Render the terminal UI and resolve once the user quits */
export async function runTui(
  services: TuiServices,
  options: StreamOptions,
  username: string | null
): Promise<void> {
  const instance = render(<App services={services} initialOptions={options} username={username} />)
  await instance.waitUntilExit()
}
