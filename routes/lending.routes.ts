import { Router } from 'express';
import * as LendingController from '../controllers/lending';
import { validateFields } from '../middlewares/field-validator';

const lendingRoutes = Router();

const transferBody = validateFields([
  { name: 'amount', type: 'amount' },
  { name: 'authorization', type: 'string', optional: true },
]);

lendingRoutes.get('/markets', LendingController.listMarkets);
lendingRoutes.get('/markets/:asset', LendingController.getMarket);
lendingRoutes.post('/markets/:asset/supply', transferBody, LendingController.supply);
lendingRoutes.post('/markets/:asset/withdraw', transferBody, LendingController.withdraw);
lendingRoutes.post('/markets/:asset/borrow', transferBody, LendingController.borrow);
lendingRoutes.post('/markets/:asset/repay', transferBody, LendingController.repay);
lendingRoutes.post(
  '/markets/:asset/collateral',
  validateFields([{ name: 'enabled', type: 'boolean' }]),
  LendingController.setCollateral
);
lendingRoutes.post('/markets/:asset/accrue', LendingController.accrue);
lendingRoutes.post(
  '/liquidations',
  validateFields([
    { name: 'borrower', type: 'string' },
    { name: 'borrowAsset', type: 'string' },
    { name: 'collateralAsset', type: 'string' },
    { name: 'repayAmount', type: 'amount' },
    { name: 'authorization', type: 'string', optional: true },
  ]),
  LendingController.liquidate
);
lendingRoutes.get('/accounts/:user/liquidity', LendingController.getAccountLiquidity);
lendingRoutes.get('/accounts/:user/positions', LendingController.getPositions);
lendingRoutes.get('/accounts/:user/balances/:asset', LendingController.getBalances);

export default lendingRoutes;
