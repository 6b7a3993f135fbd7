// Narration prompts for the external text-generation collaborator
// The engine only builds prompts; the caller supplies the narrator function

import type { SimulationOutcome, WeeklySimulationOutcome } from './digital-twin'
import { engineLog } from './engine-config'
import type { ScoredReport } from './lab-report'

export type Narrator = (prompt: string) => Promise<string>

function scoreLine(label: string, report: ScoredReport): string {
  const { overallScore, label: band } = report.interpretation
  return `${label}: ${overallScore}/100 (${band})`
}

function bulletList(items: readonly string[], empty = 'None'): string {
  return items.length > 0 ? items.map(item => `- ${item}`).join('\n') : empty
}

export function buildSimulationPrompt(outcome: SimulationOutcome): string {
  const kinds = Object.keys(outcome.intervention).join(', ') || 'none'
  return [
    `Analyze a ${outcome.durationWeeks}-week health simulation.`,
    `Interventions: ${kinds}`,
    `Intervention details: ${JSON.stringify(outcome.intervention)}`,
    scoreLine('Baseline health score', outcome.baselineReport),
    scoreLine('Projected health score', outcome.projectedReport),
    'Improvements:',
    bulletList(outcome.improvements),
    'Remaining risk factors:',
    bulletList(outcome.projectedReport.interpretation.riskFactors),
    'Explain the expected changes, the most important remaining risks, and how to sustain the improvements.',
  ].join('\n')
}

export function buildProgressionPrompt(outcome: WeeklySimulationOutcome): string {
  const weekly = outcome.progression.map(entry =>
    `Week ${entry.week}: score ${entry.report.interpretation.overallScore}/100`)
  return [
    `Analyze ${outcome.durationWeeks} weeks of recorded health progression.`,
    scoreLine('Starting health score', outcome.baselineReport),
    scoreLine('Final health score', outcome.finalReport),
    'Weekly scores:',
    bulletList(weekly),
    'Improvements:',
    bulletList(outcome.improvements),
    'Describe the overall trend, the weeks where it changed most, and maintenance recommendations.',
  ].join('\n')
}

/** Narrator failures become a fixed message instead of an exception */
export async function narrateSafely(narrator: Narrator, prompt: string): Promise<string> {
  try {
    return await narrator(prompt)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    engineLog.warn(`Narration failed: ${message}`)
    return `Unable to generate analysis: ${message}`
  }
}
