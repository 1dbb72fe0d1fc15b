export * from './remote-ssh';
export * from './action';
