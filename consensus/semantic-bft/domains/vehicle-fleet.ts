// consensus/semantic-bft/domains/vehicle-fleet.ts
// Vehicles that raise concept events inside their domain each round

import { DomainsConfig } from '../core/config/config-manager';
import { SeededRandom } from '../core/random/seeded-random';
import { RoundContext, RoundParticipant } from '../network/round-scheduler';
import { CrossDomainCoordinator } from './cross-domain-coordinator';
import { Domain } from './domain';

export interface Vehicle {
  id: string;
  domain: Domain;
  eventsGenerated: number;
}

export class VehicleFleet implements RoundParticipant {
  private vehicles: Vehicle[] = [];
  private events = 0;

  constructor(
    private readonly coordinator: CrossDomainCoordinator,
    private readonly config: DomainsConfig,
    private readonly rng: SeededRandom,
    vehiclesPerDomain: number = config.vehiclesPerDomain
  ) {
    for (const domain of coordinator.getDomains()) {
      for (let i = 0; i < vehiclesPerDomain; i++) {
        this.vehicles.push({ id: `${domain.name}-vehicle-${i}`, domain, eventsGenerated: 0 });
      }
    }
  }

  /**
   * Each vehicle raises an event with `eventProbability`; a share of them
   * need finality in every domain
   */
  public async onRound(context: RoundContext): Promise<void> {
    for (const vehicle of this.vehicles) {
      if (!this.rng.nextBoolean(this.config.eventProbability)) continue;

      const vector = vehicle.domain.codec.generate(this.rng, vehicle.id, context.now, vehicle.domain.name);
      const crossDomain = this.rng.nextBoolean(this.config.crossDomainProbability);
      vehicle.eventsGenerated++;
      this.events++;
      await this.coordinator.processTransaction(vehicle.domain, vector, crossDomain, context.now);
    }
  }

  public getVehicles(): readonly Vehicle[] {
    return this.vehicles;
  }

  public getEventCount(): number {
    return this.events;
  }
}
