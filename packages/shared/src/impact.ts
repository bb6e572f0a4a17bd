// Impact assessment types

export type ImpactDomain = 'aviation' | 'maritime' | 'telecom' | 'power' | 'operations' | 'security' | 'general';

export type ImpactLevel = 'low' | 'medium' | 'high';

export interface ImpactNote {
  domain: ImpactDomain;
  level: ImpactLevel;
  note: string;
}
