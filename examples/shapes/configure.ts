import { configureRegistries } from '@registrar/core';

// Imported ahead of the implementation modules so their registrations run
// under these settings.
configureRegistries({ onDuplicate: 'error', logger: { level: 'debug' } });
