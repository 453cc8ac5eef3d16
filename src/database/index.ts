export { connectDatabase, disconnectDatabase, checkDatabaseHealth } from './connection.js';

export { initializeModels, validateModels, PhotoModel, PhotoTagModel } from './models.js';
