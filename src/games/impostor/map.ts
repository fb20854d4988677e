export const LOCATIONS = [
  'Cafeteria',
  'Reactor',
  'Electrical',
  'MedBay',
  'Navigation',
  'Security',
  'Admin',
  'Storage',
] as const;
export type Location = (typeof LOCATIONS)[number];

export const START_LOCATION: Location = 'Cafeteria';

export const LOCATION_TASKS: Record<Location, readonly string[]> = {
  Cafeteria: ['Empty garbage', 'Fix wiring', 'Accept diverted power'],
  Reactor: ['Start reactor sequence', 'Unlock manifolds', 'Divert power'],
  Electrical: ['Fix wiring', 'Calibrate distributor', 'Divert power'],
  MedBay: ['Submit scan', 'Inspect sample', 'Sort samples'],
  Navigation: ['Chart course', 'Stabilize steering', 'Fix wiring'],
  Security: ['Fix wiring', 'Sort files', 'Swipe card'],
  Admin: ['Swipe card', 'Upload data', 'Fix wiring'],
  Storage: ['Empty garbage', 'Fuel engines', 'Fix wiring'],
};

/** Case-insensitive room lookup. */
export function parseLocation(name: string): Location | null {
  const needle = name.trim().toLowerCase();
  return LOCATIONS.find(l => l.toLowerCase() === needle) ?? null;
}

export interface TaskAssignment {
  location: Location;
  task: string;
  completed: boolean;
}

export function allTaskSlots(): Array<{ location: Location; task: string }> {
  return LOCATIONS.flatMap(location => LOCATION_TASKS[location].map(task => ({ location, task })));
}
