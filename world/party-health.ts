import type { PartyMember, WorldSnapshot } from './types';

const LOW_HP_RATIO = 0.25;

function hpRatio(member: PartyMember): number {
  return member.hpCurrent / Math.max(member.hpMax, 1);
}

/** Warnings about the lead member and the party as a whole, most urgent first. */
export function partyHealthWarnings(snapshot: WorldSnapshot, inBattle: boolean): string[] {
  const lead = snapshot.party[0];
  if (!lead) {
    return [];
  }

  const warnings: string[] = [];
  const leadPercent = lead.hpMax > 0 ? (lead.hpCurrent / lead.hpMax) * 100 : 0;

  if (lead.hpCurrent === 0 && !inBattle) {
    warnings.push(
      `CRITICAL: ${lead.speciesName} has fainted! Switch to a healthy party member, then head to the nearest healing center.`
    );
  } else if (leadPercent > 0 && leadPercent < LOW_HP_RATIO * 100) {
    warnings.push(
      `CRITICAL HP WARNING: ${lead.speciesName} is at ${lead.hpCurrent}/${lead.hpMax} HP (${leadPercent.toFixed(0)}%)! Stop fighting and go heal now.`
    );
  }

  if (snapshot.party.every((member) => hpRatio(member) < LOW_HP_RATIO)) {
    warnings.push('EMERGENCY: the whole party is low on HP! Heal immediately and avoid wild encounters and trainers.');
  }

  return warnings;
}

/** First party member still able to fight. */
export function leadHealthyMember(snapshot: WorldSnapshot): PartyMember | undefined {
  return snapshot.party.find((member) => member.hpCurrent > 0);
}
