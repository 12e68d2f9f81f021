import type { Amount, Identity } from './types.js';

export type DomainRegisteredEvent = {
  type: 'DomainRegistered';
  name: string;
  owner: Identity;
  amount: Amount;
  years: number;
};

export type DomainRenewedEvent = {
  type: 'DomainRenewed';
  name: string;
  additionalYears: number;
  amount: Amount;
};

export type PriceChangedEvent = {
  type: 'PriceChanged';
  newPrice: Amount;
};

export type MultiplierChangedEvent = {
  type: 'MultiplierChanged';
  newMultiplier: Amount;
};

export type PausedEvent = {
  type: 'Paused';
  account: Identity;
};

export type UnpausedEvent = {
  type: 'Unpaused';
  account: Identity;
};

export type RegistryEvent =
  | DomainRegisteredEvent
  | DomainRenewedEvent
  | PriceChangedEvent
  | MultiplierChangedEvent
  | PausedEvent
  | UnpausedEvent;

export type RegistryEventType = RegistryEvent['type'];

export const REGISTRY_EVENT_TYPES = [
  'DomainRegistered',
  'DomainRenewed',
  'PriceChanged',
  'MultiplierChanged',
  'Paused',
  'Unpaused'
] as const satisfies readonly RegistryEventType[];
