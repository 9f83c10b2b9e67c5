export interface CarrierSeed {
  mcNumber: string;
  legalName: string;
  totalPriorLoads: number;
  averageRating: number | null;
}

export const carrierSeeds: CarrierSeed[] = [
  { mcNumber: 'MC-100001', legalName: 'Prairie Line Freight', totalPriorLoads: 15, averageRating: 4.8 },
  { mcNumber: 'MC-100002', legalName: 'Blue Ridge Hauling', totalPriorLoads: 25, averageRating: 4.2 },
  { mcNumber: 'MC-100003', legalName: 'Gulf Coast Carriers', totalPriorLoads: 3, averageRating: 4.9 },
  { mcNumber: 'MC-100004', legalName: 'New Route Logistics', totalPriorLoads: 0, averageRating: null },
];
