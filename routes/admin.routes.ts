import { Router } from 'express';
import * as AdminController from '../controllers/admin';
import { validateFields } from '../middlewares/field-validator';
import { isAdmin } from '../middlewares/isAdmin';
import { isAuthenticated } from '../middlewares/isAuthenticated';

const adminRoutes = Router();

// All admin routes require authentication and admin role
adminRoutes.use(isAuthenticated);
adminRoutes.use(isAdmin);

adminRoutes.post(
  '/markets',
  validateFields([
    { name: 'asset', type: 'string' },
    { name: 'annualSupplyRate', type: 'amount' },
    { name: 'annualBorrowRate', type: 'amount' },
    { name: 'reserveFactor', type: 'amount' },
    { name: 'collateralFactor', type: 'amount' },
    { name: 'liquidationThreshold', type: 'amount' },
    { name: 'initialPrice', type: 'amount' },
  ]),
  AdminController.registerMarket
);
adminRoutes.put('/markets/:asset/price', validateFields([{ name: 'price', type: 'amount' }]), AdminController.setPrice);
adminRoutes.put(
  '/markets/:asset/rates',
  validateFields([
    { name: 'annualSupplyRate', type: 'amount' },
    { name: 'annualBorrowRate', type: 'amount' },
  ]),
  AdminController.updateRates
);
adminRoutes.put('/pause', validateFields([{ name: 'paused', type: 'boolean' }]), AdminController.setPaused);
adminRoutes.post(
  '/wallets/:account/credit',
  validateFields([
    { name: 'asset', type: 'string' },
    { name: 'amount', type: 'amount' },
  ]),
  AdminController.creditWallet
);

export default adminRoutes;
