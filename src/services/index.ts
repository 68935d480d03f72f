import { Knex } from 'knex';
import { LedgerServiceOptions } from '../types';
import { DriverService } from './driver.service';
import { DskService } from './dsk.service';
import { EntitlementService } from './entitlement.service';
import { InvoiceService } from './invoice.service';
import { LeaveService } from './leave.service';
import { PenaltyService } from './penalty.service';
import { PlanCatalogService } from './plan-catalog.service';
import { StationService } from './station.service';
import { SwapService } from './swap.service';

export interface LedgerServices {
  drivers: DriverService;
  dsk: DskService;
  entitlements: EntitlementService;
  invoices: InvoiceService;
  leaves: LeaveService;
  penalties: PenaltyService;
  plans: PlanCatalogService;
  stations: StationService;
  swaps: SwapService;
}

export function createLedgerServices(db: Knex, options: LedgerServiceOptions = {}): LedgerServices {
  return {
    drivers: new DriverService(db, options),
    dsk: new DskService(db),
    entitlements: new EntitlementService(db, options),
    invoices: new InvoiceService(db, options),
    leaves: new LeaveService(db, options),
    penalties: new PenaltyService(db, options),
    plans: new PlanCatalogService(db, options),
    stations: new StationService(db),
    swaps: new SwapService(db, options),
  };
}
