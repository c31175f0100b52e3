import type { AiProfile } from './ai-profile.types.js';
import { AssassinProfile } from './assassin.profile.js';
import { BerserkerProfile } from './berserker.profile.js';
import { BruteProfile } from './brute.profile.js';
import { CasterProfile } from './caster.profile.js';
import { CommanderProfile } from './commander.profile.js';
import { ControllerProfile } from './controller.profile.js';
import { DefenderProfile } from './defender.profile.js';
import { SkirmisherProfile } from './skirmisher.profile.js';
import { SupportProfile } from './support.profile.js';
import { TacticianProfile } from './tactician.profile.js';

export type { AiProfile, AiTurnContext } from './ai-profile.types.js';
export { BaseAiProfile } from './base.profile.js';
export {
  AssassinProfile,
  BerserkerProfile,
  BruteProfile,
  CasterProfile,
  CommanderProfile,
  ControllerProfile,
  DefenderProfile,
  SkirmisherProfile,
  SupportProfile,
  TacticianProfile,
};

export function builtInProfiles(): AiProfile[] {
  return [
    new BruteProfile(),
    new SkirmisherProfile(),
    new CasterProfile(),
    new SupportProfile(),
    new BerserkerProfile(),
    new DefenderProfile(),
    new AssassinProfile(),
    new CommanderProfile(),
    new ControllerProfile(),
    new TacticianProfile(),
  ];
}

export function registerBuiltInProfiles(registry: { register(profile: AiProfile): void }): void {
  for (const profile of builtInProfiles()) registry.register(profile);
}
