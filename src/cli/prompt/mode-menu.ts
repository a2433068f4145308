import { PROVIDER_VARIANTS, isProviderVariant } from '@shared/types'
import type { CounterEngine } from '@core/counters'

export interface ModeMenuDeps {
  engine: CounterEngine
  output: (line: string) => void
  ask: (prompt: string) => Promise<string | null>
}

export function formatModeList(engine: CounterEngine): string[] {
  return PROVIDER_VARIANTS.map((variant) => {
    const marker = variant === engine.selectedVariant() ? '*' : ' '
    return `\t${marker} ${variant} - ${engine.describeVariant(variant)}`
  })
}

/**
 * Shows the current mode and every variant, then switches the engine to the key the
 * user enters. Unknown keys leave the mode unchanged.
 */
export async function runModeMenu(deps: ModeMenuDeps): Promise<void> {
  const { engine, output, ask } = deps

  output('')
  output(`Current Mode: ${engine.selectedVariant()}`)
  output('')
  output('Select one of the following modes for analyzing counters by entering the corresponding key:')
  for (const line of formatModeList(engine)) {
    output(line)
  }

  const answer = await ask('\nEnter mode key: ')
  if (answer === null) return

  const modeInput = answer.trim()
  const key = modeInput.toUpperCase()

  if (isProviderVariant(key)) {
    engine.selectVariant(key)
    output(`Mode set to ${key}`)
  } else {
    output(`Unable to recognize: ${modeInput}, please try again with a key from the list.`)
  }
}
