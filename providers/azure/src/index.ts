export * from './kinds/disks';
export * from './kinds/generic';
export * from './kinds/virtualMachines';
export * from './kinds/virtualNetworks';
export * from './registry';
export * from './shape';
