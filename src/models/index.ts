import sequelize from '../config/database.js';

import loadModel, { Load } from './load.js';
import carrierModel, { Carrier } from './carrier.js';
import negotiationRoundModel, { NegotiationRound } from './negotiationRound.js';
import negotiationSessionClosureModel, {
  NegotiationSessionClosure,
} from './negotiationSessionClosure.js';

export interface Models {
  Load: typeof Load;
  Carrier: typeof Carrier;
  NegotiationRound: typeof NegotiationRound;
  NegotiationSessionClosure: typeof NegotiationSessionClosure;
}

// Rounds reference loads and carriers by id only; those rows are owned by
// other services, so no associations are declared.
const models: Models = {
  Load: loadModel(sequelize),
  Carrier: carrierModel(sequelize),
  NegotiationRound: negotiationRoundModel(sequelize),
  NegotiationSessionClosure: negotiationSessionClosureModel(sequelize),
};

export { Load, Carrier, NegotiationRound, NegotiationSessionClosure, sequelize };

export default models;
