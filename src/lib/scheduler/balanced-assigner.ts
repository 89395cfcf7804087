import { defaultRandom, sampleDistinct, shuffle } from "./random"
import { toMillis } from "./clock-time"
import type { RandomSource, Slot } from "./types"

export interface AssignmentResult {
  slots: Slot[]
  unassigned: string[]
}

export function judgeIdsFor(judgeCount: number): number[] {
  return Array.from({ length: judgeCount }, (_, i) => i + 1)
}

/**
 * Per-judge quota for `itemCount` items: every judge gets `itemCount div J`,
 * and `itemCount mod J` judges chosen at random get one more.
 */
export function computeJudgeTargets(
  itemCount: number,
  judgeIds: readonly number[],
  random: RandomSource = defaultRandom
): Map<number, number> {
  const base = Math.floor(itemCount / judgeIds.length)
  const remainder = itemCount % judgeIds.length
  const extraJudges = new Set(remainder > 0 ? sampleDistinct(judgeIds, remainder, random) : [])

  return new Map(judgeIds.map((judgeId) => [judgeId, base + (extraJudges.has(judgeId) ? 1 : 0)]))
}

/**
 * Spreads teams over the judges' grids so judge loads differ by at most one.
 * Both the judge order and the team order are shuffled; within a judge,
 * teams fill that judge's slots in ascending start order.
 *
 * Returns a filled copy of `slots`; the inputs are left as they were.
 */
export function assignBalanced(
  slots: readonly Slot[],
  teams: readonly string[],
  judgeCount: number,
  random: RandomSource = defaultRandom
): AssignmentResult {
  const filled = slots.map((s) => ({ ...s }))
  const unassigned: string[] = []
  if (teams.length === 0) {
    return { slots: filled, unassigned }
  }

  const judgeIds = judgeIdsFor(judgeCount)
  const targets = computeJudgeTargets(teams.length, judgeIds, random)

  const assignments: number[] = []
  for (const judgeId of judgeIds) {
    const target = targets.get(judgeId) ?? 0
    for (let i = 0; i < target; i++) {
      assignments.push(judgeId)
    }
  }

  const shuffledAssignments = shuffle(assignments, random)
  const shuffledTeams = shuffle(teams, random)

  const judgeSlots = new Map<number, Slot[]>(judgeIds.map((id) => [id, []]))
  const ordered = [...filled].sort(
    (a, b) => a.judgeId - b.judgeId || toMillis(a.start) - toMillis(b.start)
  )
  for (const slot of ordered) {
    judgeSlots.get(slot.judgeId)?.push(slot)
  }

  const nextIndex = new Map<number, number>(judgeIds.map((id) => [id, 0]))
  shuffledTeams.forEach((team, position) => {
    if (position >= shuffledAssignments.length) {
      unassigned.push(team)
      return
    }
    const judgeId = shuffledAssignments[position]
    const slotList = judgeSlots.get(judgeId) ?? []
    const index = nextIndex.get(judgeId) ?? 0
    if (index >= slotList.length) {
      unassigned.push(team)
      return
    }
    slotList[index].team = team
    nextIndex.set(judgeId, index + 1)
  })

  return { slots: filled, unassigned }
}
